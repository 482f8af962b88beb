import pLimit from 'p-limit';
import { assertRecordTypesSupported, supportsConcurrency } from './capabilities.js';
import { resolveConfig, type EngineConfig, type EngineConfigOverrides } from './config.js';
import { computeChangeSet, writableRecords } from './diff.js';
import { cleanDomain } from './domain.js';
import { ConfigurationError, FetchError, errorMessage } from './errors.js';
import { executeCorrections, type CorrectionResult } from './executor.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { getRegistrarCorrections } from './nameservers.js';
import { planCorrections } from './planner.js';
import type { DnsProvider, Registrar } from './provider.js';
import { normalizeRecord, toCanonicalRecord } from './record.js';
import { createRetryPolicy, type RetryPolicy, type RetryPolicyOptions } from './retry.js';
import type { ChangeSet, Correction, DnsRecord, ZoneDeclaration } from './types.js';

export interface ReconcileOptions {
  config?: EngineConfigOverrides | EngineConfig;
  /** Replaces the policy built from `config.retry` */
  retry?: RetryPolicy;
  logger?: Logger;
  /** Compute corrections without executing them */
  preview?: boolean;
}

export interface ZoneCorrections {
  zone: string;
  changes: ChangeSet;
  corrections: Correction[];
}

export interface ZoneReconcileResult extends ZoneCorrections {
  /** Empty in preview mode */
  results: CorrectionResult[];
}

export type ZoneOutcome =
  | ({ status: 'ok' } & ZoneReconcileResult)
  | { status: 'error'; zone: string; error: Error };

function retryFor(
  backend: Pick<DnsProvider, 'isRateLimited'>,
  options: ReconcileOptions,
  log: Logger
): RetryPolicy {
  if (options.retry) return options.retry;
  const config = resolveConfig(options.config);
  const policy: RetryPolicyOptions = {
    maxAttempts: config.retry.maxAttempts,
    intervalMs: config.retry.intervalMs,
    logger: log,
  };
  if (backend.isRateLimited) {
    policy.isRateLimited = backend.isRateLimited.bind(backend);
  }
  return createRetryPolicy(policy);
}

function desiredRecords(zone: ZoneDeclaration, provider: DnsProvider): DnsRecord[] {
  const { defaultTtl } = provider.descriptor;
  const records = zone.records.map((r) => toCanonicalRecord(r, zone.origin, defaultTtl));

  assertRecordTypesSupported(provider.descriptor, records);

  const problems = provider.auditRecords?.(records) ?? [];
  if (problems.length > 0) {
    throw new ConfigurationError(
      `${provider.descriptor.name}: ${cleanDomain(zone.origin)}: ${problems.join('; ')}`
    );
  }
  return records;
}

async function fetchActual(
  zone: string,
  provider: DnsProvider,
  retry: RetryPolicy
): Promise<DnsRecord[]> {
  let fetched: DnsRecord[];
  try {
    fetched = await retry.run(() => provider.getZoneRecords(zone));
  } catch (err) {
    if (err instanceof FetchError) throw err;
    throw new FetchError(
      `${provider.descriptor.name}: failed to fetch records for ${zone}: ${errorMessage(err)}`,
      { cause: err }
    );
  }
  return fetched.map((r) => normalizeRecord(r, zone, provider.descriptor.defaultTtl));
}

async function computeWith(
  zone: ZoneDeclaration,
  provider: DnsProvider,
  retry: RetryPolicy
): Promise<ZoneCorrections> {
  const origin = cleanDomain(zone.origin);
  const desired = desiredRecords(zone, provider);
  const actual = await fetchActual(origin, provider, retry);
  const changes = computeChangeSet(desired, actual, provider.descriptor);
  const corrections = planCorrections({
    origin,
    changes,
    desired: writableRecords(desired, provider.descriptor),
    provider,
  });
  return { zone: origin, changes, corrections };
}

/**
 * Fetch the zone's live records, diff them against the declaration and plan
 * corrections. Nothing is written to the backend.
 */
export async function computeZoneCorrections(
  zone: ZoneDeclaration,
  provider: DnsProvider,
  options: ReconcileOptions = {}
): Promise<ZoneCorrections> {
  const log = (options.logger ?? rootLogger).child({
    provider: provider.descriptor.name,
    zone: cleanDomain(zone.origin),
  });
  return computeWith(zone, provider, retryFor(provider, options, log));
}

/** One full pass for a zone: compute corrections, then execute them in order */
export async function reconcileZone(
  zone: ZoneDeclaration,
  provider: DnsProvider,
  options: ReconcileOptions = {}
): Promise<ZoneReconcileResult> {
  const log = (options.logger ?? rootLogger).child({
    provider: provider.descriptor.name,
    zone: cleanDomain(zone.origin),
  });
  const retry = retryFor(provider, options, log);

  const computed = await computeWith(zone, provider, retry);
  log.info(
    { corrections: computed.corrections.length },
    computed.corrections.length === 0 ? 'Zone is up to date' : 'Corrections computed'
  );

  if (options.preview) {
    return { ...computed, results: [] };
  }
  const results = await executeCorrections(computed.corrections, { retry, logger: log });
  return { ...computed, results };
}

/**
 * Reconcile several zones on one provider. Zones run in parallel only when
 * the provider declares concurrency safety; otherwise they are serialized.
 * A zone's failure is captured in its outcome and never affects the others.
 */
export async function reconcileZones(
  zones: readonly ZoneDeclaration[],
  provider: DnsProvider,
  options: ReconcileOptions = {}
): Promise<ZoneOutcome[]> {
  const config = resolveConfig(options.config);
  const concurrency = supportsConcurrency(provider.descriptor) ? config.concurrency : 1;
  const limit = pLimit(concurrency);
  const zoneOptions: ReconcileOptions = { ...options, config };

  return Promise.all(
    zones.map((zone) =>
      limit(async (): Promise<ZoneOutcome> => {
        try {
          const result = await reconcileZone(zone, provider, zoneOptions);
          return { status: 'ok', ...result };
        } catch (err) {
          return {
            status: 'error',
            zone: cleanDomain(zone.origin),
            error: err instanceof Error ? err : new Error(String(err)),
          };
        }
      })
    )
  );
}

export interface RegistrarReconcileResult {
  domain: string;
  corrections: Correction[];
  results: CorrectionResult[];
}

/** Align a domain's delegation with the declared nameservers */
export async function reconcileNameservers(
  zone: ZoneDeclaration,
  registrar: Registrar,
  options: ReconcileOptions = {}
): Promise<RegistrarReconcileResult> {
  const domain = cleanDomain(zone.origin);
  const log = (options.logger ?? rootLogger).child({ registrar: registrar.name, zone: domain });
  const retry = retryFor(registrar, options, log);

  const declared = zone.nameservers ?? [];
  if (declared.length === 0) {
    log.warn('No nameservers declared, skipping registrar update');
    return { domain, corrections: [], results: [] };
  }

  const corrections = await getRegistrarCorrections(domain, declared, registrar, retry);
  if (options.preview) {
    return { domain, corrections, results: [] };
  }
  const results = await executeCorrections(corrections, { retry, logger: log });
  return { domain, corrections, results };
}
