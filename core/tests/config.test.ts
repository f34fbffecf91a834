import { describe, it, expect } from 'vitest';
import { loadConfig, VERSION } from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      MODE: 'both',
      PORT: 3001,
      MAX_SOURCE_LENGTH: 100_000,
      RATE_LIMIT_RPS: 5,
      RATE_LIMIT_BURST: 10,
    });
  });

  it('coerces numeric variables and ignores unrelated ones', () => {
    expect(loadConfig({ MODE: 'http', PORT: '8080', RATE_LIMIT_RPS: '0.5', HOME: '/root' })).toMatchObject({
      MODE: 'http',
      PORT: 8080,
      RATE_LIMIT_RPS: 0.5,
    });
  });

  it('rejects an unknown mode', () => {
    expect(() => loadConfig({ MODE: 'grpc' })).toThrow(/^Invalid configuration: MODE: /);
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /);
  });

  it('exposes a semver version', () => {
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });
});
