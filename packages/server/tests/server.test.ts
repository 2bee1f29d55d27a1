import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ServerToClientMessage, SystemState } from '@shared/messages';
import { ConvergenceError, ValidationError } from '@shared/errors';
import { createBroadcastTick, createMessageHandler } from '@server/server';
import type { ISimulationService } from '@server/simulationService';

const state: SystemState = {
  system: 'kerbol',
  timestamp: 1_000,
  time: 25,
  timeScale: 1,
  bodies: [],
};

function fakeService(): ISimulationService {
  return {
    initialize: vi.fn(async () => undefined),
    tick: vi.fn(),
    getLatestData: vi.fn(() => null),
    query: vi.fn(() => state),
    setTimeScale: vi.fn((scale: number) => {
      if (scale < 0) throw new ValidationError('Time scale must be a finite non-negative number');
    }),
    setTime: vi.fn(),
    shutdown: vi.fn(),
  };
}

function setup() {
  const service = fakeService();
  const responses: ServerToClientMessage[] = [];
  const handleMessage = createMessageHandler(service, (message) => responses.push(message));
  return { service, responses, handleMessage };
}

describe('createMessageHandler', () => {
  it('should answer queries with the current state', () => {
    const { responses, handleMessage } = setup();
    handleMessage(JSON.stringify({ type: 'query', queryId: 3 }));
    expect(responses).toEqual([{ type: 'queryResult', queryId: 3, state }]);
  });

  it('should forward time controls without answering', () => {
    const { service, responses, handleMessage } = setup();
    handleMessage(JSON.stringify({ type: 'setTimeScale', scale: 100 }));
    handleMessage(JSON.stringify({ type: 'setTime', time: 86400 }));
    expect(service.setTimeScale).toHaveBeenCalledWith(100);
    expect(service.setTime).toHaveBeenCalledWith(86400);
    expect(responses).toEqual([]);
  });

  it('should answer malformed frames with an error message', () => {
    const { responses, handleMessage } = setup();
    handleMessage('{"type":"warp"}');
    expect(responses).toEqual([{ type: 'error', message: 'Unknown message type "warp"' }]);
  });

  it('should answer rejected commands with an error message', () => {
    const { responses, handleMessage } = setup();
    handleMessage(JSON.stringify({ type: 'setTimeScale', scale: -2 }));
    expect(responses).toEqual([{ type: 'error', message: 'Time scale must be a finite non-negative number' }]);
  });

  it('should let unexpected failures propagate', () => {
    const { service, handleMessage } = setup();
    vi.mocked(service.query).mockImplementation(() => {
      throw new Error('boom');
    });
    expect(() => handleMessage(JSON.stringify({ type: 'query', queryId: 1 }))).toThrow('boom');
  });
});

describe('createBroadcastTick', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should send the latest frame after each tick', () => {
    const service = fakeService();
    const frame = Buffer.from('{"time":25}');
    vi.mocked(service.getLatestData).mockReturnValue(frame);
    const sendFrame = vi.fn();
    createBroadcastTick(service, sendFrame)();
    expect(service.tick).toHaveBeenCalledTimes(1);
    expect(sendFrame).toHaveBeenCalledWith(frame);
  });

  it('should send nothing before there is a frame', () => {
    const sendFrame = vi.fn();
    createBroadcastTick(fakeService(), sendFrame)();
    expect(sendFrame).not.toHaveBeenCalled();
  });

  it('should log a failed tick and keep going', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const service = fakeService();
    const failure = new ConvergenceError(0.1, 0.99, 100);
    vi.mocked(service.tick).mockImplementationOnce(() => {
      throw failure;
    });
    vi.mocked(service.getLatestData).mockReturnValue(Buffer.from('{}'));
    const sendFrame = vi.fn();
    const tick = createBroadcastTick(service, sendFrame);

    expect(() => tick()).not.toThrow();
    expect(errorSpy).toHaveBeenCalledWith('Simulation tick failed:', failure);
    expect(sendFrame).not.toHaveBeenCalled();

    tick();
    expect(sendFrame).toHaveBeenCalledTimes(1);
  });
});
