import { readFileSync } from 'node:fs';
import { ValidationError } from './errors';
import { buildSystem } from './system';
import type { CelestialSystem } from './system';
import type { BodyRecord, OrbitRecord } from './types';

export const BUNDLED_SYSTEMS = ['kerbol', 'solar'] as const;
export type BundledSystem = (typeof BUNDLED_SYSTEMS)[number];

export function isBundledSystem(name: string): name is BundledSystem {
	return BUNDLED_SYSTEMS.some((system) => system === name);
}

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(row: Row, key: string, where: string): number | undefined {
	const value = row[key];
	if (value === undefined) return undefined;
	if (typeof value !== 'number') {
		throw new ValidationError(`${where}: "${key}" must be a number`);
	}
	return value;
}

function parseOrbit(value: unknown, where: string): OrbitRecord {
	if (!isRow(value)) {
		throw new ValidationError(`${where}: "orbit" must be an object`);
	}
	const primary = value.primary;
	if (typeof primary !== 'string') {
		throw new ValidationError(`${where}: "orbit.primary" must name a body`);
	}
	const placement = {
		primary,
		eccentricity: optionalNumber(value, 'eccentricity', where),
		inclination: optionalNumber(value, 'inclination', where),
		longitudeOfAscendingNode: optionalNumber(value, 'longitudeOfAscendingNode', where),
		argumentOfPeriapsis: optionalNumber(value, 'argumentOfPeriapsis', where),
		epoch: optionalNumber(value, 'epoch', where),
		meanAnomalyAtEpoch: optionalNumber(value, 'meanAnomalyAtEpoch', where),
	};
	const periapsis = optionalNumber(value, 'periapsis', where);
	const semiMajorAxis = optionalNumber(value, 'semiMajorAxis', where);
	if (periapsis !== undefined && semiMajorAxis === undefined) {
		return { ...placement, periapsis };
	}
	if (semiMajorAxis !== undefined && periapsis === undefined) {
		return { ...placement, semiMajorAxis };
	}
	throw new ValidationError(`${where}: give exactly one of "periapsis" and "semiMajorAxis"`);
}

/**
 * Narrows a parsed name -> parameters table into body rows. Angles in the
 * table are in degrees, everything else in SI units.
 */
export function parseBodyTable(table: unknown): BodyRecord[] {
	if (!isRow(table)) {
		throw new ValidationError('A body table must be an object keyed by body name');
	}
	return Object.entries(table).map(([name, row]): BodyRecord => {
		if (!isRow(row)) {
			throw new ValidationError(`${name}: expected an object`);
		}
		const base = {
			name,
			radius: optionalNumber(row, 'radius', name),
			rotationalPeriod: optionalNumber(row, 'rotationalPeriod', name),
			orbit: row.orbit === undefined ? undefined : parseOrbit(row.orbit, name),
		};
		const gravitationalParameter = optionalNumber(row, 'gravitationalParameter', name);
		const mass = optionalNumber(row, 'mass', name);
		if (gravitationalParameter !== undefined && mass === undefined) {
			return { ...base, gravitationalParameter };
		}
		if (mass !== undefined && gravitationalParameter === undefined) {
			return { ...base, mass };
		}
		throw new ValidationError(`${name}: give exactly one of "gravitationalParameter" and "mass"`);
	});
}

export function loadBundledSystem(name: BundledSystem): CelestialSystem {
	const file = new URL(`../data/${name}.json`, import.meta.url);
	const table: unknown = JSON.parse(readFileSync(file, 'utf8'));
	return buildSystem(parseBodyTable(table));
}
