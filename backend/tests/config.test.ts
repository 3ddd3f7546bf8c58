import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to local defaults', () => {
    expect(loadConfig({})).toEqual({
      postgres: {
        host: 'localhost',
        port: 5432,
        user: 'retail',
        password: 'retailpass',
        database: 'retaildb',
        statementTimeoutMs: 30_000,
      },
      apiPort: 8080,
      segmentTopN: 3,
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ POSTGRES_PORT: '6543', API_PORT: '9000', REPORT_SEGMENT_TOP_N: '5' });
    expect(config.postgres.port).toBe(6543);
    expect(config.apiPort).toBe(9000);
    expect(config.segmentTopN).toBe(5);
  });

  it('rejects values that are not positive integers', () => {
    expect(() => loadConfig({ REPORT_SEGMENT_TOP_N: '0' })).toThrow();
    expect(() => loadConfig({ POSTGRES_PORT: 'abc' })).toThrow();
  });
});
