import { ValidationError } from '@shared/errors';
import { loadBundledSystem } from '@shared/systems';
import type { CelestialSystem } from '@shared/system';
import type { BodyState, SystemState } from '@shared/messages';
import type { ISimulationService } from './simulationService';
import type { BundledSystem } from '@shared/systems';

export interface OrbitSimulationOptions {
    timeScale?: number;
    startTime?: number;
    /** Wall clock in milliseconds; injectable for tests. */
    now?: () => number;
}

/**
 * Advances simulation time with the wall clock and evaluates every body of a
 * system on its Keplerian orbit at that time.
 */
export class OrbitSimulationService implements ISimulationService {
    private system: CelestialSystem | null = null;
    private readonly now: () => number;
    private time: number;
    private timeScale: number;
    private lastTick: number | null = null;
    private latest: Buffer | null = null;

    constructor(
        private readonly systemName: BundledSystem,
        options: OrbitSimulationOptions = {},
    ) {
        this.now = options.now ?? Date.now;
        this.time = options.startTime ?? 0;
        this.timeScale = options.timeScale ?? 1;
    }

    async initialize(): Promise<void> {
        this.system = loadBundledSystem(this.systemName);
        // eslint-disable-next-line no-console
        console.log(`[OrbitSimulationService] Loaded ${this.systemName}: ${this.system.size} bodies around ${this.system.root.name}`);
    }

    tick(): void {
        const now = this.now();
        if (this.lastTick !== null) {
            this.time += ((now - this.lastTick) / 1000) * this.timeScale;
        }
        this.lastTick = now;
        this.latest = Buffer.from(JSON.stringify(this.query()));
    }

    getLatestData(): Buffer | null {
        return this.latest;
    }

    query(): SystemState {
        const system = this.requireSystem();
        const bodies: BodyState[] = system.bodies().map((body) => {
            const { position, velocity } = system.absoluteState(body, this.time);
            return {
                name: body.name,
                primary: body.primary?.name ?? null,
                position,
                velocity,
                radius: body.radius,
                mass: body.mass,
                trueAnomaly: body.orbit?.trueAnomaly(this.time) ?? null,
            };
        });
        return {
            system: this.systemName,
            timestamp: this.now(),
            time: this.time,
            timeScale: this.timeScale,
            bodies,
        };
    }

    setTimeScale(scale: number): void {
        if (!Number.isFinite(scale) || scale < 0) {
            throw new ValidationError(`Time scale must be a finite non-negative number, got ${scale}`);
        }
        this.timeScale = scale;
    }

    setTime(time: number): void {
        if (!Number.isFinite(time)) {
            throw new ValidationError(`Simulation time must be finite, got ${time}`);
        }
        this.time = time;
    }

    shutdown(): void {
        this.system = null;
        this.latest = null;
        this.lastTick = null;
    }

    private requireSystem(): CelestialSystem {
        if (!this.system) {
            throw new Error('OrbitSimulationService used before initialize()');
        }
        return this.system;
    }
}
