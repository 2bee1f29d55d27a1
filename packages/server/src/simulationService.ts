import type { SystemState } from '@shared/messages';

/**
 * What the WebSocket front end needs from whatever produces body states.
 * The server only drives it: one `tick` per broadcast, commands from
 * clients, and a final `shutdown`.
 */
export interface ISimulationService {
  /** Loads the system; called once before the first tick. */
  initialize(): Promise<void>;

  /** Moves simulation time forward to the wall clock and refreshes the cached frame. */
  tick(): void;

  /** JSON frame produced by the last tick, or null before the first one. */
  getLatestData(): Buffer | null;

  query(): SystemState;

  setTimeScale(scale: number): void;

  setTime(time: number): void;

  shutdown(): void;
}
