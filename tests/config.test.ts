import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_RETRY_INTERVAL_MS,
  DEFAULT_RETRY_MAX_ATTEMPTS,
  resolveConfig,
} from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      retry: {
        maxAttempts: DEFAULT_RETRY_MAX_ATTEMPTS,
        intervalMs: DEFAULT_RETRY_INTERVAL_MS,
      },
      concurrency: DEFAULT_CONCURRENCY,
    });
  });

  it('reads environment variables', () => {
    const config = resolveConfig(
      {},
      {
        ZONESYNC_RETRY_MAX_ATTEMPTS: '5',
        ZONESYNC_RETRY_INTERVAL_MS: '250',
        ZONESYNC_CONCURRENCY: '2',
      }
    );

    expect(config).toEqual({ retry: { maxAttempts: 5, intervalMs: 250 }, concurrency: 2 });
  });

  it('prefers explicit overrides over the environment', () => {
    const config = resolveConfig(
      { retry: { maxAttempts: 7 }, concurrency: 1 },
      { ZONESYNC_RETRY_MAX_ATTEMPTS: '5', ZONESYNC_CONCURRENCY: '3' }
    );

    expect(config.retry.maxAttempts).toBe(7);
    expect(config.retry.intervalMs).toBe(DEFAULT_RETRY_INTERVAL_MS);
    expect(config.concurrency).toBe(1);
  });

  it('rejects non-numeric environment values', () => {
    expect(() => resolveConfig({}, { ZONESYNC_CONCURRENCY: 'many' })).toThrow(
      'ZONESYNC_CONCURRENCY must be a number, got "many"'
    );
  });

  it('rejects out-of-range values', () => {
    expect(() => resolveConfig({ retry: { maxAttempts: 0 } }, {})).toThrow(ConfigurationError);
    expect(() => resolveConfig({ concurrency: 1.5 }, {})).toThrow('concurrency');
  });
});
