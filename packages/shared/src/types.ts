
export type Vec3 = [number, number, number];

/** Row-major 3x3 matrix. */
export type Mat3 = [Vec3, Vec3, Vec3];

export type OrbitKind = 'circular' | 'elliptic' | 'parabolic' | 'hyperbolic';

/**
 * Canonical Keplerian elements. Every other representation of an orbit
 * (apsides, period, state vectors) is normalised into this set.
 */
export interface OrbitalElements {
	periapsis: number; // m
	eccentricity: number;
	inclination: number; // rad, [0, pi]
	longitudeOfAscendingNode: number; // rad, 0 when the inclination is 0
	argumentOfPeriapsis: number; // rad, 0 when the orbit is circular
	epoch: number; // s
	meanAnomalyAtEpoch: number; // rad
}

/** Orientation and time origin shared by every orbit parameterisation. */
export interface OrbitPlacement {
	inclination?: number;
	longitudeOfAscendingNode?: number;
	argumentOfPeriapsis?: number;
	epoch?: number;
	meanAnomalyAtEpoch?: number;
}

export interface ByPeriapsisEccentricity extends OrbitPlacement {
	shape: 'periapsis';
	periapsis: number;
	eccentricity?: number;
}

export interface BySemiMajorAxisEccentricity extends OrbitPlacement {
	shape: 'semiMajorAxis';
	semiMajorAxis: number;
	eccentricity?: number;
}

export interface ByApsides extends OrbitPlacement {
	shape: 'apses';
	apsis1: number;
	// Absent or infinite for an open orbit; `eccentricity` then gives the shape
	apsis2?: number;
	eccentricity?: number;
}

export interface ByPeriodEccentricity extends OrbitPlacement {
	shape: 'period';
	period: number;
	eccentricity?: number;
}

export type ConicBranch = 'elliptic' | 'hyperbolic';

export interface ByPeriodApsis extends OrbitPlacement {
	shape: 'periodApsis';
	period: number;
	apsis: number;
	branch?: ConicBranch;
}

export interface ByStateVector {
	shape: 'state';
	position: Vec3;
	velocity: Vec3;
	epoch: number;
}

export type OrbitSpec =
	| ByPeriapsisEccentricity
	| BySemiMajorAxisEccentricity
	| ByApsides
	| ByPeriodEccentricity
	| ByPeriodApsis
	| ByStateVector;

/** Anything an orbit can be drawn around. */
export interface GravitationalPrimary {
	readonly gravitationalParameter: number;
}

export interface OrbitalState {
	position: Vec3;
	velocity: Vec3;
}

export type BodyProperties = {
	name: string;
	radius?: number; // m, 0 when unknown
	rotationalPeriod?: number; // s, 0 when not rotating
} & (
	| { gravitationalParameter: number; mass?: never } // m^3/s^2
	| { mass: number; gravitationalParameter?: never } // kg
);

/** A row of a body table, as produced by a parser of some data format. */
export type BodyRecord = BodyProperties & {
	orbit?: OrbitRecord;
};

/**
 * Orbit of a table row. Angles are in degrees, as body tables are usually
 * written; the primary is referenced by name.
 */
export type OrbitRecord = {
	primary: string;
	inclination?: number;
	longitudeOfAscendingNode?: number;
	argumentOfPeriapsis?: number;
	epoch?: number;
	meanAnomalyAtEpoch?: number;
} & (
	| { periapsis: number; eccentricity?: number; semiMajorAxis?: never }
	| { semiMajorAxis: number; eccentricity?: number; periapsis?: never }
);
