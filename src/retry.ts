import { setTimeout as delay } from 'node:timers/promises';
import { RateLimitError } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';

export interface RetryPolicyOptions {
  /** Total calls allowed, including the first */
  maxAttempts: number;
  /** Fixed wait between a rate-limited call and the next attempt */
  intervalMs: number;
  /** Backend-specific rate-limit marker; `RateLimitError` is always recognized */
  isRateLimited?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly intervalMs: number;
  run<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * Bounded retry for backend calls.
 *
 * Only rate-limited failures are retried, after `intervalMs`; any other
 * error propagates at once. When every attempt is rate limited the last
 * error is rethrown.
 */
export function createRetryPolicy(options: RetryPolicyOptions): RetryPolicy {
  const { maxAttempts, intervalMs } = options;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const log = options.logger ?? rootLogger;

  function rateLimited(error: unknown): boolean {
    return (
      error instanceof RateLimitError ||
      (options.isRateLimited?.(error) ?? false)
    );
  }

  return {
    maxAttempts,
    intervalMs,
    async run<T>(fn: () => Promise<T>): Promise<T> {
      let attempt = 1;
      while (true) {
        try {
          return await fn();
        } catch (err) {
          if (!rateLimited(err) || attempt >= maxAttempts) {
            throw err;
          }
          log.warn(
            { attempt, maxAttempts, intervalMs },
            'Rate limit exceeded, waiting to retry'
          );
          await sleep(intervalMs);
          attempt++;
        }
      }
    },
  };
}
