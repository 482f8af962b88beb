import { z } from 'zod';
import { ConfigurationError } from './errors.js';

/** Namecheap documents 20 calls/min; 23 waits of 5s ride out a full window */
export const DEFAULT_RETRY_MAX_ATTEMPTS = 23;
export const DEFAULT_RETRY_INTERVAL_MS = 5_000;
export const DEFAULT_CONCURRENCY = 4;

const EngineConfigSchema = z.object({
  retry: z.object({
    maxAttempts: z.number().int().min(1),
    intervalMs: z.number().int().min(0),
  }),
  concurrency: z.number().int().min(1),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export interface EngineConfigOverrides {
  retry?: Partial<EngineConfig['retry']>;
  concurrency?: number;
}

type Env = Record<string, string | undefined>;

function fromEnv(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Resolve engine settings: explicit overrides win over `ZONESYNC_*`
 * environment variables, which win over the defaults.
 */
export function resolveConfig(
  overrides: EngineConfigOverrides = {},
  env: Env = process.env
): EngineConfig {
  const candidate = {
    retry: {
      maxAttempts:
        overrides.retry?.maxAttempts ??
        fromEnv(env, 'ZONESYNC_RETRY_MAX_ATTEMPTS') ??
        DEFAULT_RETRY_MAX_ATTEMPTS,
      intervalMs:
        overrides.retry?.intervalMs ??
        fromEnv(env, 'ZONESYNC_RETRY_INTERVAL_MS') ??
        DEFAULT_RETRY_INTERVAL_MS,
    },
    concurrency:
      overrides.concurrency ??
      fromEnv(env, 'ZONESYNC_CONCURRENCY') ??
      DEFAULT_CONCURRENCY,
  };

  const parsed = EngineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join(', ');
    throw new ConfigurationError(`Invalid engine config: ${details}`);
  }
  return parsed.data;
}
