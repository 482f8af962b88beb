export const RECORD_TYPES = [
  'A',
  'AAAA',
  'CNAME',
  'MX',
  'TXT',
  'NS',
  'PTR',
  'ALIAS',
  'CAA',
  'SRV',
  'URL',
  'URL301',
  'FRAME',
] as const;

export type RecordType = (typeof RECORD_TYPES)[number];

/** Redirect pseudo-records some registrars offer in place of real DNS data */
export type RedirectRecordType = 'URL' | 'URL301' | 'FRAME';

/**
 * A DNS record in canonical form.
 *
 * `label` is relative to the zone origin (`@` for the apex). `target` holds
 * the type's main value: an address, a fully qualified hostname, TXT text or
 * a redirect destination. Multi-field types carry their extra fields
 * alongside.
 */
export interface DnsRecord {
  label: string;
  type: RecordType;
  target: string;
  /** Seconds */
  ttl: number;
  mxPreference?: number;
  srvPriority?: number;
  srvWeight?: number;
  srvPort?: number;
  caaFlag?: number;
  caaTag?: string;
  /** Provider-assigned identifier for fetched records; ignored when comparing */
  id?: string;
}

/** A record as written in a declaration or returned by a provider API */
export interface RecordInput {
  /** Label, relative name or FQDN (e.g. `www`, `@`, `www.example.com.`) */
  name: string;
  type: string;
  /** Zone-file style rdata (e.g. `10 mail.example.com.` for MX) */
  value: string;
  ttl?: number;
  id?: string;
}

/** Desired state for one zone; treated as immutable by the engine */
export interface ZoneDeclaration {
  origin: string;
  records: readonly (RecordInput | DnsRecord)[];
  nameservers?: readonly string[];
}

export interface RecordModification {
  existing: DnsRecord;
  desired: DnsRecord;
}

/** Classification of the differences between desired and actual records */
export interface ChangeSet {
  toCreate: DnsRecord[];
  toDelete: DnsRecord[];
  toModify: RecordModification[];
  /** Informational notices for declared changes that will not be applied */
  toReport: string[];
}

export interface ReportOnlyCorrection {
  description: string;
  isReportOnly: true;
}

export interface ExecutableCorrection {
  description: string;
  isReportOnly: false;
  action: () => Promise<void>;
}

/** A single planned change unit, rendered for preview and optionally executed */
export type Correction = ReportOnlyCorrection | ExecutableCorrection;
