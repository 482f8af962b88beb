export {
  computeZoneCorrections,
  reconcileZone,
  reconcileZones,
  reconcileNameservers,
} from './reconcile.js';
export { computeChangeSet, changeCount, compareRecords, writableRecords } from './diff.js';
export {
  planCorrections,
  describeCreate,
  describeDelete,
  describeModify,
} from './planner.js';
export { executeCorrections } from './executor.js';
export { createRetryPolicy } from './retry.js';
export { getRegistrarCorrections, canonicalNameservers } from './nameservers.js';
export {
  parseRecord,
  normalizeRecord,
  toCanonicalRecord,
  formatRecord,
  recordValue,
  recordIdentity,
  recordsEqual,
  isRecordType,
} from './record.js';
export { RECORD_HANDLERS } from './record-types.js';
export { APEX, cleanDomain, toLabel, toFqdn, qualifyHostname } from './domain.js';
export {
  CAPABILITIES,
  can,
  cannot,
  unimplemented,
  capability,
  defineCapabilities,
  supportsRecordType,
  supportsConcurrency,
  assertRecordTypesSupported,
} from './capabilities.js';
export { resolveConfig } from './config.js';
export { logger } from './logger.js';
export {
  ZoneSyncError,
  ConfigurationError,
  InvalidRecordError,
  FetchError,
  RateLimitError,
  ApplyError,
} from './errors.js';
export { RECORD_TYPES } from './types.js';
export type {
  DnsRecord,
  RecordInput,
  RecordType,
  RedirectRecordType,
  ZoneDeclaration,
  ChangeSet,
  RecordModification,
  Correction,
  ExecutableCorrection,
  ReportOnlyCorrection,
} from './types.js';
export type {
  DnsProvider,
  Registrar,
  IncrementalChanges,
  ProviderZone,
} from './provider.js';
export type {
  Capability,
  CapabilityStatus,
  Support,
  ProviderDescriptor,
  ProviderDescriptorInput,
} from './capabilities.js';
export type { RecordTypeHandler } from './record-types.js';
export type { RetryPolicy, RetryPolicyOptions } from './retry.js';
export type { CorrectionResult, CorrectionStatus, ExecuteOptions } from './executor.js';
export type {
  ReconcileOptions,
  ZoneCorrections,
  ZoneReconcileResult,
  ZoneOutcome,
  RegistrarReconcileResult,
} from './reconcile.js';
export type { EngineConfig, EngineConfigOverrides } from './config.js';
export type { ZoneSyncErrorCode } from './errors.js';
