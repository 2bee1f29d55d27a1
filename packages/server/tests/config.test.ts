import { describe, expect, it } from 'vitest';
import { ValidationError } from '@shared/errors';
import { DEFAULT_CONFIG, loadConfig } from '@server/config';

describe('loadConfig', () => {
  it('should fall back on the defaults', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    expect(loadConfig({ ORRERY_PORT: '  ' })).toEqual(DEFAULT_CONFIG);
  });

  it('should read overrides from the environment', () => {
    expect(
      loadConfig({
        ORRERY_PORT: '8080',
        ORRERY_TICK_RATE: '30',
        ORRERY_SYSTEM: 'solar',
        ORRERY_TIME_SCALE: '3600',
        ORRERY_START_TIME: '-86400',
      }),
    ).toEqual({
      port: 8080,
      tickRateHz: 30,
      system: 'solar',
      timeScale: 3600,
      startTime: -86400,
    });
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ ORRERY_PORT: '70000' })).toThrow(ValidationError);
    expect(() => loadConfig({ ORRERY_PORT: 'http' })).toThrow('Invalid ORRERY_PORT: "http"');
    expect(() => loadConfig({ ORRERY_TICK_RATE: '0' })).toThrow(ValidationError);
    expect(() => loadConfig({ ORRERY_TIME_SCALE: '-1' })).toThrow(ValidationError);
    expect(() => loadConfig({ ORRERY_SYSTEM: 'andromeda' })).toThrow('Invalid ORRERY_SYSTEM: "andromeda"');
  });
});
