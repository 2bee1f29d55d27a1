import { DAY, G, HOUR, JULIAN_YEAR, MINUTE } from './constants';
import { ValidationError, requireFinite } from './errors';
import type { Orbit } from './orbit';
import type { BodyProperties, GravitationalPrimary } from './types';

const TIME_PATTERN = /^Year (-?\d+), day (-?\d+), (\d+):(\d{2}):(\d{2}(?:\.\d+)?)$/;

function pad2(value: number): string {
	return value.toString().padStart(2, '0');
}

/**
 * A node of a celestial system: physical properties plus the orbit anchoring
 * it to its primary. The root of a system (its star) has no orbit.
 */
export class CelestialBody implements GravitationalPrimary {
	public readonly name: string;
	public readonly gravitationalParameter: number;
	public readonly radius: number;
	public readonly rotationalPeriod: number;
	public readonly orbit: Orbit<CelestialBody> | null;
	private readonly children: CelestialBody[] = [];

	constructor(properties: BodyProperties, orbit: Orbit<CelestialBody> | null = null) {
		if (properties.name.trim() === '') {
			throw new ValidationError('A body needs a name');
		}
		this.name = properties.name;

		const gravitationalParameter = properties.gravitationalParameter ?? (properties.mass ?? NaN) * G;
		requireFinite(`gravitational parameter of ${this.name}`, gravitationalParameter);
		if (gravitationalParameter <= 0) {
			throw new ValidationError(`${this.name} must have a positive mass, got gravitational parameter ${gravitationalParameter}`);
		}
		this.gravitationalParameter = gravitationalParameter;

		this.radius = requireFinite(`radius of ${this.name}`, properties.radius ?? 0);
		this.rotationalPeriod = requireFinite(`rotational period of ${this.name}`, properties.rotationalPeriod ?? 0);
		if (this.radius < 0 || this.rotationalPeriod < 0) {
			throw new ValidationError(`${this.name} has a negative radius or rotational period`);
		}

		this.orbit = orbit;
	}

	get mass(): number {
		return this.gravitationalParameter / G;
	}

	get primary(): CelestialBody | null {
		return this.orbit?.primary ?? null;
	}

	get satellites(): readonly CelestialBody[] {
		return this.children;
	}

	/**
	 * Registers a body orbiting this one. Called once per child by the system
	 * builder, after both ends exist.
	 */
	linkSatellite(satellite: CelestialBody): void {
		if (satellite.primary !== this) {
			throw new ValidationError(`${satellite.name} does not orbit ${this.name}`);
		}
		if (this.children.includes(satellite)) {
			throw new ValidationError(`${satellite.name} is already a satellite of ${this.name}`);
		}
		this.children.push(satellite);
	}

	get surfaceGravity(): number {
		if (this.radius === 0) return Infinity;
		return this.gravitationalParameter / (this.radius * this.radius);
	}

	escapeVelocity(distance: number = this.radius): number {
		return Math.sqrt((2 * this.gravitationalParameter) / distance);
	}

	/** Laplace sphere of influence, infinite for the root or an unbound body. */
	get sphereOfInfluence(): number {
		if (this.orbit === null || this.orbit.eccentricity >= 1) {
			return Infinity;
		}
		const ratio = this.gravitationalParameter / this.orbit.primary.gravitationalParameter;
		return this.orbit.semiMajorAxis * ratio ** 0.4;
	}

	// --- Local calendar ---

	private get dayLength(): number {
		return this.rotationalPeriod > 0 ? this.rotationalPeriod : DAY;
	}

	private get yearLength(): number {
		return this.orbit !== null && this.orbit.eccentricity < 1 ? this.orbit.period : JULIAN_YEAR;
	}

	/**
	 * Time as seen from the body: years of one orbital period, days of one
	 * rotation, then hours, minutes and seconds into the day.
	 * `Year 1, day 1, 00:00:00.000` is t = 0.
	 */
	time2str(time: number): string {
		requireFinite('time', time);
		const year = Math.floor(time / this.yearLength);
		// Rounding may leave a remainder a hair below zero
		const intoYear = Math.max(0, time - year * this.yearLength);
		const day = Math.floor(intoYear / this.dayLength);
		const intoDay = Math.max(0, intoYear - day * this.dayLength);
		const hours = Math.floor(intoDay / HOUR);
		const intoHour = Math.max(0, intoDay - hours * HOUR);
		const minutes = Math.floor(intoHour / MINUTE);
		const seconds = Math.max(0, intoHour - minutes * MINUTE);
		return `Year ${year + 1}, day ${day + 1}, ${pad2(hours)}:${pad2(minutes)}:${seconds.toFixed(3).padStart(6, '0')}`;
	}

	str2time(text: string): number {
		const match = TIME_PATTERN.exec(text.trim());
		if (match === null) {
			throw new ValidationError(`Unrecognised time string "${text}"`);
		}
		const [, year, day, hours, minutes, seconds] = match;
		return (
			(Number(year) - 1) * this.yearLength +
			(Number(day) - 1) * this.dayLength +
			Number(hours) * HOUR +
			Number(minutes) * MINUTE +
			Number(seconds)
		);
	}

	toString(): string {
		return this.name;
	}
}
