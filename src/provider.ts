import type { ProviderDescriptor } from './capabilities.js';
import type { DnsRecord, RecordModification } from './types.js';

export interface IncrementalChanges {
  creates: DnsRecord[];
  deletes: DnsRecord[];
  modifies: RecordModification[];
}

/** A zone hosted by a provider, as listed by `listZones` */
export interface ProviderZone {
  id: string;
  name: string;
}

/**
 * Contract every DNS backend adapter implements. An adapter is a value
 * built once per account (credentials bound in) and passed to the engine.
 */
export interface DnsProvider {
  readonly descriptor: ProviderDescriptor;
  /** Current records of the zone; fetched records may carry provider ids */
  getZoneRecords(origin: string): Promise<DnsRecord[]>;
  /** Required when `descriptor.supportsIncrementalCRUD` */
  applyIncremental?(origin: string, changes: IncrementalChanges): Promise<void>;
  /** Required for bundle-only backends */
  applyFullReplace?(origin: string, records: readonly DnsRecord[]): Promise<void>;
  /** Available when the descriptor declares `CanGetZones` */
  listZones?(): Promise<ProviderZone[]>;
  /** Recognizes the backend's own rate-limit signal on an error */
  isRateLimited?(error: unknown): boolean;
  /** Backend-specific rejections of declared records, as messages */
  auditRecords?(records: readonly DnsRecord[]): string[];
}

/** Registrar role: controls which nameservers a domain is delegated to */
export interface Registrar {
  readonly name: string;
  getNameservers(domain: string): Promise<string[]>;
  setNameservers(domain: string, nameservers: readonly string[]): Promise<void>;
  isRateLimited?(error: unknown): boolean;
}
