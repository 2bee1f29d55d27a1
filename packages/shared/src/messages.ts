import { ValidationError } from './errors';
import type { Vec3 } from './types';

export interface BodyState {
	name: string;
	primary: string | null;
	// Relative to the root of the system
	position: Vec3;
	velocity: Vec3;
	radius: number;
	mass: number;
	trueAnomaly: number | null;
}

export interface SystemState {
	system: string;
	timestamp: number; // wall clock, ms
	time: number; // simulation time, s
	timeScale: number;
	bodies: BodyState[];
}

// --- Client -> Server Messages ---

export interface QueryMessage {
  type: 'query';
  queryId: number;
}

export interface SetTimeScaleMessage {
  type: 'setTimeScale';
  scale: number;
}

export interface SetTimeMessage {
  type: 'setTime';
  time: number;
}

/** Commands a client may send. */
export type ClientToServerMessage =
  | QueryMessage
  | SetTimeScaleMessage
  | SetTimeMessage;

// --- Server -> Client Messages ---

export interface QueryResultMessage {
  type: 'queryResult';
  queryId: number;
  state: SystemState;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
}

/** Replies the server sends back on the same connection. */
export type ServerToClientMessage = QueryResultMessage | ErrorMessage;

function numberField(message: Record<string, unknown>, key: string): number {
  const value = message[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`"${key}" must be a finite number`);
  }
  return value;
}

/** Narrows an untrusted JSON frame into a client message. */
export function parseClientMessage(raw: string): ClientToServerMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(`Malformed message: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('A message must be a JSON object');
  }
  const message: Record<string, unknown> = { ...parsed };
  switch (message.type) {
    case 'query':
      return { type: 'query', queryId: numberField(message, 'queryId') };
    case 'setTimeScale':
      return { type: 'setTimeScale', scale: numberField(message, 'scale') };
    case 'setTime':
      return { type: 'setTime', time: numberField(message, 'time') };
    default:
      throw new ValidationError(`Unknown message type ${JSON.stringify(message.type)}`);
  }
}
