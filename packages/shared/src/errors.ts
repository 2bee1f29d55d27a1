/** Base class of every error raised by the orbit core. */
export class OrreryError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/** Malformed or inconsistent input parameters. */
export class ValidationError extends OrreryError {}

/** Operation undefined for the shape of the orbit it was asked of. */
export class DomainError extends OrreryError {}

/** The Kepler equation solver ran out of iterations. */
export class ConvergenceError extends OrreryError {
	public readonly meanAnomaly: number;
	public readonly eccentricity: number;
	public readonly iterations: number;

	constructor(meanAnomaly: number, eccentricity: number, iterations: number) {
		super(`Kepler equation did not converge after ${iterations} iterations (M=${meanAnomaly}, e=${eccentricity})`);
		this.meanAnomaly = meanAnomaly;
		this.eccentricity = eccentricity;
		this.iterations = iterations;
	}
}

export function requireFinite(name: string, value: number): number {
	if (!Number.isFinite(value)) {
		throw new ValidationError(`${name} must be a finite number, got ${value}`);
	}
	return value;
}
