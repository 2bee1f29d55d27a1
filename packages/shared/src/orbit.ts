import { ECCENTRICITY_EPSILON, NODE_EPSILON, TWO_PI } from './constants';
import { DomainError, ValidationError, requireFinite } from './errors';
import { eccentricFromMean, meanFromTrue, trueFromMean, wrapAngle } from './kepler';
import { Matrix, cross, dot, norm, scale, subtract } from './vector';
import type {
	ByApsides,
	ByPeriapsisEccentricity,
	ByPeriodApsis,
	ByPeriodEccentricity,
	BySemiMajorAxisEccentricity,
	GravitationalPrimary,
	Mat3,
	OrbitKind,
	OrbitPlacement,
	OrbitSpec,
	OrbitalElements,
	OrbitalState,
	Vec3,
} from './types';

type ElementsInput = Pick<OrbitalElements, 'periapsis'> & Partial<OrbitalElements>;
type Placement = Omit<OrbitalElements, 'periapsis' | 'eccentricity'>;

const X_AXIS: Vec3 = [1, 0, 0];
const Z_AXIS: Vec3 = [0, 0, 1];

// Relative tolerance when a supplied eccentricity is checked against the apsides
const APSES_ECCENTRICITY_TOLERANCE = 1e-9;

function placementOf(spec: OrbitPlacement): Placement {
	return {
		inclination: spec.inclination ?? 0,
		longitudeOfAscendingNode: spec.longitudeOfAscendingNode ?? 0,
		argumentOfPeriapsis: spec.argumentOfPeriapsis ?? 0,
		epoch: spec.epoch ?? 0,
		meanAnomalyAtEpoch: spec.meanAnomalyAtEpoch ?? 0,
	};
}

function requirePositive(name: string, value: number): number {
	if (Number.isNaN(value) || value <= 0) {
		throw new ValidationError(`${name} must be positive, got ${value}`);
	}
	return value;
}

/** |a| of the conic whose mean motion matches `period` around `mu`. */
function semiMajorAxisFromPeriod(mu: number, period: number): number {
	requireFinite('period', period);
	requirePositive('period', period);
	const meanMotion = TWO_PI / period;
	return Math.cbrt(mu / (meanMotion * meanMotion));
}

/** Signed angle from `from` to `to` around the unit vector `normal`. */
function planeAngle(from: Vec3, to: Vec3, normal: Vec3): number {
	return Math.atan2(dot(cross(from, to), normal), dot(from, to));
}

/**
 * A Keplerian conic around a primary, held as one canonical set of elements.
 * Instances are immutable: the alternate constructors normalise their inputs
 * into a fresh orbit.
 */
export class Orbit<P extends GravitationalPrimary = GravitationalPrimary> {
	public readonly primary: P;
	public readonly periapsis: number;
	public readonly eccentricity: number;
	public readonly inclination: number;
	public readonly longitudeOfAscendingNode: number;
	public readonly argumentOfPeriapsis: number;
	public readonly epoch: number;
	public readonly meanAnomalyAtEpoch: number;
	/** Rotation from the perifocal frame to the primary's frame. */
	public readonly orientation: Mat3;

	constructor(primary: P, elements: ElementsInput) {
		const mu = requireFinite('gravitational parameter of the primary', primary.gravitationalParameter);
		requirePositive('gravitational parameter of the primary', mu);

		this.primary = primary;
		this.periapsis = requirePositive('periapsis', requireFinite('periapsis', elements.periapsis));
		this.eccentricity = requireFinite('eccentricity', elements.eccentricity ?? 0);
		this.inclination = requireFinite('inclination', elements.inclination ?? 0);
		this.longitudeOfAscendingNode = requireFinite('longitude of ascending node', elements.longitudeOfAscendingNode ?? 0);
		this.argumentOfPeriapsis = requireFinite('argument of periapsis', elements.argumentOfPeriapsis ?? 0);
		this.epoch = requireFinite('epoch', elements.epoch ?? 0);
		this.meanAnomalyAtEpoch = requireFinite('mean anomaly at epoch', elements.meanAnomalyAtEpoch ?? 0);

		if (this.eccentricity < 0) {
			throw new ValidationError(`eccentricity must not be negative, got ${this.eccentricity}`);
		}
		if (this.inclination < 0 || this.inclination > Math.PI) {
			throw new ValidationError(`inclination must lie in [0, pi], got ${this.inclination}`);
		}

		this.orientation = Matrix.fromEulerAngles(this.longitudeOfAscendingNode, this.inclination, this.argumentOfPeriapsis);
	}

	// --- Alternate constructors ---

	static fromSpec<P extends GravitationalPrimary>(primary: P, spec: OrbitSpec): Orbit<P> {
		switch (spec.shape) {
			case 'periapsis':
				return Orbit.fromPeriapsis(primary, spec);
			case 'semiMajorAxis':
				return Orbit.fromSemiMajorAxis(primary, spec);
			case 'apses':
				return Orbit.fromApses(primary, spec);
			case 'period':
				return Orbit.fromPeriod(primary, spec);
			case 'periodApsis':
				return Orbit.fromPeriodApsis(primary, spec);
			case 'state':
				return Orbit.fromState(primary, spec.position, spec.velocity, spec.epoch);
		}
	}

	static fromPeriapsis<P extends GravitationalPrimary>(primary: P, spec: Omit<ByPeriapsisEccentricity, 'shape'>): Orbit<P> {
		return new Orbit(primary, {
			...placementOf(spec),
			periapsis: spec.periapsis,
			eccentricity: spec.eccentricity ?? 0,
		});
	}

	/** Semi-major axis is signed: negative for a hyperbola. */
	static fromSemiMajorAxis<P extends GravitationalPrimary>(primary: P, spec: Omit<BySemiMajorAxisEccentricity, 'shape'>): Orbit<P> {
		const eccentricity = spec.eccentricity ?? 0;
		if (eccentricity === 1) {
			throw new ValidationError('A parabolic orbit cannot be described by its semi-major axis');
		}
		return new Orbit(primary, {
			...placementOf(spec),
			periapsis: requireFinite('semi-major axis', spec.semiMajorAxis) * (1 - eccentricity),
			eccentricity,
		});
	}

	/**
	 * Two finite apsides fix the shape; the eccentricity, when also given, must
	 * agree with them. With one apsis absent or infinite the orbit is open, the
	 * finite one is the periapsis and the eccentricity (default 1) is required
	 * to be at least 1.
	 */
	static fromApses<P extends GravitationalPrimary>(primary: P, spec: Omit<ByApsides, 'shape'>): Orbit<P> {
		const apses = [spec.apsis1, spec.apsis2 ?? Infinity];
		apses.forEach((apsis) => requirePositive('apsis', apsis));
		const finite = apses.filter(Number.isFinite);

		if (finite.length === 0) {
			throw new ValidationError('At least one apsis must be finite');
		}
		if (finite.length === 1) {
			const eccentricity = spec.eccentricity ?? 1;
			if (eccentricity < 1) {
				throw new ValidationError(`An infinite apoapsis needs an eccentricity of at least 1, got ${eccentricity}`);
			}
			return new Orbit(primary, { ...placementOf(spec), periapsis: finite[0], eccentricity });
		}

		const periapsis = Math.min(finite[0], finite[1]);
		const apoapsis = Math.max(finite[0], finite[1]);
		const eccentricity = (apoapsis - periapsis) / (apoapsis + periapsis);
		if (
			spec.eccentricity !== undefined &&
			Math.abs(spec.eccentricity - eccentricity) > APSES_ECCENTRICITY_TOLERANCE * Math.max(1, eccentricity)
		) {
			throw new ValidationError(`Eccentricity ${spec.eccentricity} disagrees with apsides ${periapsis} and ${apoapsis}`);
		}
		return new Orbit(primary, { ...placementOf(spec), periapsis, eccentricity });
	}

	static fromPeriod<P extends GravitationalPrimary>(primary: P, spec: Omit<ByPeriodEccentricity, 'shape'>): Orbit<P> {
		const eccentricity = spec.eccentricity ?? 0;
		if (eccentricity === 1) {
			throw new DomainError('A parabolic orbit has no period');
		}
		const semiMajorAxis = semiMajorAxisFromPeriod(primary.gravitationalParameter, spec.period);
		return new Orbit(primary, {
			...placementOf(spec),
			periapsis: semiMajorAxis * Math.abs(1 - eccentricity),
			eccentricity,
		});
	}

	/**
	 * The period fixes |a|. On the elliptic branch the apsis is either the
	 * periapsis (e = 1 - r/a) or the apoapsis (e = r/a - 1); only one of the
	 * two roots is non-negative. On the hyperbolic branch it can only be the
	 * periapsis.
	 */
	static fromPeriodApsis<P extends GravitationalPrimary>(primary: P, spec: Omit<ByPeriodApsis, 'shape'>): Orbit<P> {
		const semiMajorAxis = semiMajorAxisFromPeriod(primary.gravitationalParameter, spec.period);
		const apsis = requirePositive('apsis', requireFinite('apsis', spec.apsis));

		if ((spec.branch ?? 'elliptic') === 'hyperbolic') {
			return new Orbit(primary, {
				...placementOf(spec),
				periapsis: apsis,
				eccentricity: 1 + apsis / semiMajorAxis,
			});
		}

		if (apsis >= 2 * semiMajorAxis) {
			throw new ValidationError(`Apsis ${apsis} is unreachable on an ellipse of semi-major axis ${semiMajorAxis}`);
		}
		const asPeriapsis = 1 - apsis / semiMajorAxis;
		if (asPeriapsis >= 0) {
			return new Orbit(primary, { ...placementOf(spec), periapsis: apsis, eccentricity: asPeriapsis });
		}
		return new Orbit(primary, {
			...placementOf(spec),
			periapsis: 2 * semiMajorAxis - apsis,
			eccentricity: apsis / semiMajorAxis - 1,
		});
	}

	/**
	 * Elements from a position and velocity relative to the primary at
	 * `epoch`. An undefined node line (equatorial orbit) puts the ascending
	 * node on +X; an undefined periapsis (circular orbit) puts it on the node.
	 */
	static fromState<P extends GravitationalPrimary>(
		primary: P,
		position: Vec3,
		velocity: Vec3,
		epoch: number,
	): Orbit<P> {
		const mu = primary.gravitationalParameter;
		const distance = norm(position);
		if (distance === 0) {
			throw new ValidationError('Position must not coincide with the primary');
		}

		const h = cross(position, velocity);
		const angularMomentum = norm(h);
		if (angularMomentum === 0) {
			throw new ValidationError('Radial trajectories have no orbital plane');
		}
		const normal = scale(h, 1 / angularMomentum);

		const eccentricityVector = subtract(scale(cross(velocity, h), 1 / mu), scale(position, 1 / distance));
		const computed = norm(eccentricityVector);
		// rounding leaves a parabola a few ulps off e = 1
		const eccentricity = Math.abs(computed - 1) < ECCENTRICITY_EPSILON ? 1 : computed;
		const semiLatusRectum = (angularMomentum * angularMomentum) / mu;

		const node = cross(Z_AXIS, h);
		const nodeLength = norm(node);
		const inclination = Math.atan2(nodeLength, h[2]);

		let longitudeOfAscendingNode = 0;
		let nodeDirection = X_AXIS;
		if (nodeLength > NODE_EPSILON * angularMomentum) {
			longitudeOfAscendingNode = Math.atan2(node[1], node[0]);
			nodeDirection = scale(node, 1 / nodeLength);
		}

		let argumentOfPeriapsis = 0;
		let periapsisDirection = nodeDirection;
		if (eccentricity > ECCENTRICITY_EPSILON) {
			argumentOfPeriapsis = planeAngle(nodeDirection, eccentricityVector, normal);
			periapsisDirection = eccentricityVector;
		}

		const trueAnomaly = planeAngle(periapsisDirection, position, normal);

		return new Orbit(primary, {
			periapsis: semiLatusRectum / (1 + eccentricity),
			eccentricity,
			inclination,
			longitudeOfAscendingNode,
			argumentOfPeriapsis,
			epoch,
			meanAnomalyAtEpoch: meanFromTrue(eccentricity, trueAnomaly),
		});
	}

	// --- Derived quantities ---

	get kind(): OrbitKind {
		if (this.eccentricity === 0) return 'circular';
		if (this.eccentricity < 1) return 'elliptic';
		if (this.eccentricity === 1) return 'parabolic';
		return 'hyperbolic';
	}

	/** Negative for a hyperbola, infinite for a parabola. */
	get semiMajorAxis(): number {
		if (this.eccentricity === 1) return Infinity;
		return this.periapsis / (1 - this.eccentricity);
	}

	get apoapsis(): number {
		if (this.eccentricity >= 1) return Infinity;
		return (this.periapsis * (1 + this.eccentricity)) / (1 - this.eccentricity);
	}

	get semiLatusRectum(): number {
		return this.periapsis * (1 + this.eccentricity);
	}

	/** For a hyperbola, the rate of its hyperbolic mean anomaly. */
	get meanMotion(): number {
		if (this.eccentricity === 1) {
			throw new DomainError('A parabolic orbit has no mean motion');
		}
		return Math.sqrt(this.primary.gravitationalParameter / Math.abs(this.semiMajorAxis) ** 3);
	}

	/** For a hyperbola, 2pi over its mean motion. */
	get period(): number {
		if (this.eccentricity === 1) {
			throw new DomainError('A parabolic orbit has no period');
		}
		return TWO_PI / this.meanMotion;
	}

	/** Specific orbital energy (vis-viva constant), J/kg. */
	get specificOrbitalEnergy(): number {
		if (this.eccentricity === 1) return 0;
		return -this.primary.gravitationalParameter / (2 * this.semiMajorAxis);
	}

	/** Orbital speed at a given distance from the focus (vis-viva). */
	speedAt(distance: number): number {
		const mu = this.primary.gravitationalParameter;
		return Math.sqrt(mu * (2 / distance - 1 / this.semiMajorAxis));
	}

	// Rate of the mean anomaly; Barker's normalisation for a parabola
	private get anomalyRate(): number {
		if (this.eccentricity === 1) {
			return Math.sqrt(this.primary.gravitationalParameter / (2 * this.periapsis ** 3));
		}
		return this.meanMotion;
	}

	// --- Anomalies ---

	/** Wrapped to [0, 2pi) on closed orbits, unbounded on open ones. */
	meanAnomaly(time: number): number {
		const meanAnomaly = this.meanAnomalyAtEpoch + this.anomalyRate * (time - this.epoch);
		return this.eccentricity < 1 ? wrapAngle(meanAnomaly) : meanAnomaly;
	}

	eccentricAnomaly(time: number): number {
		return eccentricFromMean(this.eccentricity, this.meanAnomaly(time));
	}

	trueAnomaly(time: number): number {
		return trueFromMean(this.eccentricity, this.meanAnomaly(time));
	}

	/** Instant at which the (unwrapped) mean anomaly reaches `meanAnomaly`. */
	timeAtMeanAnomaly(meanAnomaly: number): number {
		return this.epoch + (meanAnomaly - this.meanAnomalyAtEpoch) / this.anomalyRate;
	}

	/** Next periapsis passage at or after `time`; the only one for an open orbit. */
	periapsisPassage(time: number): number {
		if (this.eccentricity >= 1) {
			return this.timeAtMeanAnomaly(0);
		}
		const meanAnomaly = this.meanAnomaly(time);
		return meanAnomaly === 0 ? time : time + (TWO_PI - meanAnomaly) / this.anomalyRate;
	}

	// --- State vectors ---

	distanceAtTrueAnomaly(trueAnomaly: number): number {
		return this.semiLatusRectum / (1 + this.eccentricity * Math.cos(trueAnomaly));
	}

	positionAtTrueAnomaly(trueAnomaly: number): Vec3 {
		const r = this.distanceAtTrueAnomaly(trueAnomaly);
		return Matrix.multiplyVector(this.orientation, [r * Math.cos(trueAnomaly), r * Math.sin(trueAnomaly), 0]);
	}

	velocityAtTrueAnomaly(trueAnomaly: number): Vec3 {
		const k = Math.sqrt(this.primary.gravitationalParameter / this.semiLatusRectum);
		return Matrix.multiplyVector(this.orientation, [
			-k * Math.sin(trueAnomaly),
			k * (this.eccentricity + Math.cos(trueAnomaly)),
			0,
		]);
	}

	positionAt(time: number): Vec3 {
		return this.positionAtTrueAnomaly(this.trueAnomaly(time));
	}

	velocityAt(time: number): Vec3 {
		return this.velocityAtTrueAnomaly(this.trueAnomaly(time));
	}

	stateAt(time: number): OrbitalState {
		const trueAnomaly = this.trueAnomaly(time);
		return {
			position: this.positionAtTrueAnomaly(trueAnomaly),
			velocity: this.velocityAtTrueAnomaly(trueAnomaly),
		};
	}

	/**
	 * Points along the conic: the whole ellipse for a closed orbit, the arc
	 * between 95% of the asymptote angles for an open one.
	 */
	samplePath(count: number): Vec3[] {
		if (!Number.isInteger(count) || count < 2) {
			throw new ValidationError(`A path needs at least 2 samples, got ${count}`);
		}
		let from = 0;
		let to = TWO_PI;
		if (this.eccentricity >= 1) {
			const limit = 0.95 * Math.acos(-1 / this.eccentricity);
			from = -limit;
			to = limit;
		}
		const points: Vec3[] = [];
		for (let k = 0; k < count; k++) {
			points.push(this.positionAtTrueAnomaly(from + ((to - from) * k) / (count - 1)));
		}
		return points;
	}

	toElements(): OrbitalElements {
		return {
			periapsis: this.periapsis,
			eccentricity: this.eccentricity,
			inclination: this.inclination,
			longitudeOfAscendingNode: this.longitudeOfAscendingNode,
			argumentOfPeriapsis: this.argumentOfPeriapsis,
			epoch: this.epoch,
			meanAnomalyAtEpoch: this.meanAnomalyAtEpoch,
		};
	}
}
