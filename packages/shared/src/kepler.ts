import { KEPLER_MAX_ITERATIONS, KEPLER_TOLERANCE, TWO_PI } from './constants';
import { ConvergenceError, DomainError } from './errors';

/*
 * Conversions between mean, eccentric (or hyperbolic) and true anomaly.
 *
 * Conventions, per branch of the conic:
 *   elliptic   (e < 1)  M = E - e sin E             M wraps to [0, 2pi)
 *   parabolic  (e = 1)  M = D + D^3 / 3, D = tan(nu/2)   (Barker)
 *   hyperbolic (e > 1)  M = e sinh H - H
 */

export function wrapAngle(angle: number): number {
	return ((angle % TWO_PI) + TWO_PI) % TWO_PI;
}

function newton(
	meanAnomaly: number,
	eccentricity: number,
	initial: number,
	step: (x: number) => number,
): number {
	let x = initial;
	for (let i = 0; i < KEPLER_MAX_ITERATIONS; i++) {
		const delta = step(x);
		x -= delta;
		if (Math.abs(delta) < KEPLER_TOLERANCE) {
			return x;
		}
	}
	throw new ConvergenceError(meanAnomaly, eccentricity, KEPLER_MAX_ITERATIONS);
}

/**
 * Solve M = E - e sin E for E (0 <= e < 1).
 *
 * Newton runs on M reduced to [0, 2pi). Above e = 0.8 it starts from E = pi,
 * where the iterates approach the root from one side without overshooting.
 */
export function solveElliptic(meanAnomaly: number, eccentricity: number): number {
	if (eccentricity === 0) return meanAnomaly;
	const reduced = meanAnomaly >= 0 && meanAnomaly < TWO_PI ? meanAnomaly : wrapAngle(meanAnomaly);
	const initial = eccentricity > 0.8 ? Math.PI : reduced;
	const E = newton(meanAnomaly, eccentricity, initial, (x) =>
		(x - eccentricity * Math.sin(x) - reduced) / (1 - eccentricity * Math.cos(x)),
	);
	return E + (meanAnomaly - reduced);
}

/** Solve M = e sinh H - H for H (e > 1). */
export function solveHyperbolic(meanAnomaly: number, eccentricity: number): number {
	const initial = Math.sign(meanAnomaly) * Math.log((2 * Math.abs(meanAnomaly)) / eccentricity + 1.8);
	return newton(meanAnomaly, eccentricity, initial, (H) =>
		(eccentricity * Math.sinh(H) - H - meanAnomaly) / (eccentricity * Math.cosh(H) - 1),
	);
}

/** Eccentric (e < 1) or hyperbolic (e > 1) anomaly from the mean anomaly. */
export function eccentricFromMean(eccentricity: number, meanAnomaly: number): number {
	if (eccentricity === 1) {
		throw new DomainError('A parabolic orbit has no eccentric anomaly');
	}
	return eccentricity < 1
		? solveElliptic(meanAnomaly, eccentricity)
		: solveHyperbolic(meanAnomaly, eccentricity);
}

export function trueFromEccentric(eccentricity: number, eccentricAnomaly: number): number {
	if (eccentricity === 1) {
		throw new DomainError('A parabolic orbit has no eccentric anomaly');
	}
	if (eccentricity < 1) {
		const half = eccentricAnomaly / 2;
		return 2 * Math.atan2(Math.sqrt(1 + eccentricity) * Math.sin(half), Math.sqrt(1 - eccentricity) * Math.cos(half));
	}
	return 2 * Math.atan(Math.sqrt((eccentricity + 1) / (eccentricity - 1)) * Math.tanh(eccentricAnomaly / 2));
}

export function eccentricFromTrue(eccentricity: number, trueAnomaly: number): number {
	if (eccentricity === 1) {
		throw new DomainError('A parabolic orbit has no eccentric anomaly');
	}
	const half = trueAnomaly / 2;
	if (eccentricity < 1) {
		return 2 * Math.atan2(Math.sqrt(1 - eccentricity) * Math.sin(half), Math.sqrt(1 + eccentricity) * Math.cos(half));
	}
	const limit = Math.acos(-1 / eccentricity);
	if (Math.abs(trueAnomaly) >= limit) {
		throw new DomainError(`True anomaly ${trueAnomaly} lies beyond the asymptotes (±${limit})`);
	}
	return 2 * Math.atanh(Math.sqrt((eccentricity - 1) / (eccentricity + 1)) * Math.tan(half));
}

export function meanFromEccentric(eccentricity: number, eccentricAnomaly: number): number {
	if (eccentricity < 1) {
		return eccentricAnomaly - eccentricity * Math.sin(eccentricAnomaly);
	}
	if (eccentricity > 1) {
		return eccentricity * Math.sinh(eccentricAnomaly) - eccentricAnomaly;
	}
	throw new DomainError('A parabolic orbit has no eccentric anomaly');
}

/** Barker's equation solved in closed form for the true anomaly. */
export function trueFromParabolicMean(meanAnomaly: number): number {
	const m = Math.abs(meanAnomaly);
	const y = Math.cbrt(1.5 * m + Math.sqrt(2.25 * m * m + 1));
	const d = y - 1 / y;
	return 2 * Math.atan(Math.sign(meanAnomaly) * d);
}

export function parabolicMeanFromTrue(trueAnomaly: number): number {
	const d = Math.tan(trueAnomaly / 2);
	return d + (d * d * d) / 3;
}

export function trueFromMean(eccentricity: number, meanAnomaly: number): number {
	if (eccentricity === 0) return meanAnomaly;
	if (eccentricity === 1) return trueFromParabolicMean(meanAnomaly);
	return trueFromEccentric(eccentricity, eccentricFromMean(eccentricity, meanAnomaly));
}

export function meanFromTrue(eccentricity: number, trueAnomaly: number): number {
	if (eccentricity === 0) return trueAnomaly;
	if (eccentricity === 1) return parabolicMeanFromTrue(trueAnomaly);
	return meanFromEccentric(eccentricity, eccentricFromTrue(eccentricity, trueAnomaly));
}
