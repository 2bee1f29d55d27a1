import { ValidationError } from '@shared/errors';
import { isBundledSystem } from '@shared/systems';
import type { BundledSystem } from '@shared/systems';

export interface ServerConfig {
    port: number;
    tickRateHz: number;
    system: BundledSystem;
    timeScale: number;
    startTime: number;
}

export const DEFAULT_CONFIG: ServerConfig = {
    port: 9001,
    tickRateHz: 10,
    system: 'kerbol',
    timeScale: 1,
    startTime: 0,
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, valid: (value: number) => boolean): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || !valid(value)) {
        throw new ValidationError(`Invalid ${key}: "${raw}"`);
    }
    return value;
}

/**
 * Reads the server settings from environment variables, falling back on
 * DEFAULT_CONFIG for anything unset.
 */
export function loadConfig(env: Env = process.env): ServerConfig {
    const system = env.ORRERY_SYSTEM ?? DEFAULT_CONFIG.system;
    if (!isBundledSystem(system)) {
        throw new ValidationError(`Invalid ORRERY_SYSTEM: "${system}"`);
    }
    return {
        port: readNumber(env, 'ORRERY_PORT', DEFAULT_CONFIG.port, (v) => Number.isInteger(v) && v > 0 && v < 65536),
        tickRateHz: readNumber(env, 'ORRERY_TICK_RATE', DEFAULT_CONFIG.tickRateHz, (v) => v > 0),
        system,
        timeScale: readNumber(env, 'ORRERY_TIME_SCALE', DEFAULT_CONFIG.timeScale, (v) => v >= 0),
        startTime: readNumber(env, 'ORRERY_START_TIME', DEFAULT_CONFIG.startTime, () => true),
    };
}
