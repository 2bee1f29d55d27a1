import { CelestialBody } from './body';
import { ValidationError } from './errors';
import { Orbit } from './orbit';
import { add } from './vector';
import type { BodyRecord, OrbitRecord, OrbitSpec, OrbitalState } from './types';

const DEG = Math.PI / 180;

export function orbitSpecFromRecord(record: OrbitRecord): OrbitSpec {
	const placement = {
		inclination: (record.inclination ?? 0) * DEG,
		longitudeOfAscendingNode: (record.longitudeOfAscendingNode ?? 0) * DEG,
		argumentOfPeriapsis: (record.argumentOfPeriapsis ?? 0) * DEG,
		epoch: record.epoch ?? 0,
		meanAnomalyAtEpoch: (record.meanAnomalyAtEpoch ?? 0) * DEG,
	};
	const { periapsis, semiMajorAxis, eccentricity } = record;
	if (periapsis !== undefined) {
		return { shape: 'periapsis', periapsis, eccentricity, ...placement };
	}
	if (semiMajorAxis !== undefined) {
		return { shape: 'semiMajorAxis', semiMajorAxis, eccentricity, ...placement };
	}
	throw new ValidationError('An orbit needs either a periapsis or a semi-major axis');
}

/** A linked tree of bodies with one root. */
export class CelestialSystem implements Iterable<CelestialBody> {
	public readonly root: CelestialBody;
	private readonly byName: Map<string, CelestialBody>;

	constructor(root: CelestialBody, bodies: Map<string, CelestialBody>) {
		this.root = root;
		this.byName = bodies;
	}

	get size(): number {
		return this.byName.size;
	}

	has(name: string): boolean {
		return this.byName.has(name);
	}

	find(name: string): CelestialBody | undefined {
		return this.byName.get(name);
	}

	get(name: string): CelestialBody {
		const body = this.byName.get(name);
		if (!body) {
			throw new ValidationError(`No body named "${name}" in the system of ${this.root.name}`);
		}
		return body;
	}

	/** Every body, parents before their satellites. */
	bodies(): CelestialBody[] {
		return [...this.byName.values()];
	}

	[Symbol.iterator](): Iterator<CelestialBody> {
		return this.byName.values();
	}

	/** Position and velocity relative to the root, summed up the tree. */
	absoluteState(body: CelestialBody, time: number): OrbitalState {
		let state: OrbitalState = { position: [0, 0, 0], velocity: [0, 0, 0] };
		let orbit = body.orbit;
		while (orbit !== null) {
			const local = orbit.stateAt(time);
			state = {
				position: add(state.position, local.position),
				velocity: add(state.velocity, local.velocity),
			};
			orbit = orbit.primary.orbit;
		}
		return state;
	}
}

/**
 * Collects body rows in any order, then builds the bodies once their primary
 * exists and links every satellite to its primary.
 */
export class SystemBuilder {
	private readonly records = new Map<string, BodyRecord>();

	add(record: BodyRecord): this {
		if (this.records.has(record.name)) {
			throw new ValidationError(`Duplicate body "${record.name}"`);
		}
		this.records.set(record.name, record);
		return this;
	}

	addAll(records: Iterable<BodyRecord>): this {
		for (const record of records) {
			this.add(record);
		}
		return this;
	}

	build(): CelestialSystem {
		const roots = [...this.records.values()].filter((record) => record.orbit === undefined);
		if (roots.length !== 1) {
			throw new ValidationError(
				`A system needs exactly one body without an orbit, found ${roots.length}` +
					(roots.length > 0 ? ` (${roots.map((r) => r.name).join(', ')})` : ''),
			);
		}
		for (const record of this.records.values()) {
			if (record.orbit && !this.records.has(record.orbit.primary)) {
				throw new ValidationError(`${record.name} orbits unknown body "${record.orbit.primary}"`);
			}
		}

		const built = new Map<string, CelestialBody>();
		let pending = [...this.records.values()];
		while (pending.length > 0) {
			const waiting: BodyRecord[] = [];
			for (const record of pending) {
				const body = this.construct(record, built);
				if (body) {
					built.set(record.name, body);
				} else {
					waiting.push(record);
				}
			}
			if (waiting.length === pending.length) {
				throw new ValidationError(`Orbits form a cycle: ${waiting.map((r) => r.name).join(', ')}`);
			}
			pending = waiting;
		}

		// Link in input order so that satellites keep the order of the table
		for (const name of this.records.keys()) {
			const body = built.get(name);
			if (body && body.primary) {
				body.primary.linkSatellite(body);
			}
		}

		const root = built.get(roots[0].name);
		if (!root) {
			throw new ValidationError(`Root ${roots[0].name} was not built`);
		}
		return new CelestialSystem(root, built);
	}

	private construct(record: BodyRecord, built: Map<string, CelestialBody>): CelestialBody | null {
		const { orbit } = record;
		if (orbit === undefined) {
			return new CelestialBody(record);
		}
		const primary = built.get(orbit.primary);
		if (!primary) {
			return null;
		}
		return new CelestialBody(record, Orbit.fromSpec(primary, orbitSpecFromRecord(orbit)));
	}
}

export function buildSystem(records: Iterable<BodyRecord>): CelestialSystem {
	return new SystemBuilder().addAll(records).build();
}
