import { isIPv4, isIPv6 } from 'node:net';
import { qualifyHostname } from './domain.js';
import { InvalidRecordError } from './errors.js';
import type { DnsRecord, RecordType } from './types.js';

/** Type-specific fields a handler derives from zone-file rdata */
export type TargetFields = Omit<DnsRecord, 'label' | 'type' | 'ttl' | 'id'>;

export interface RecordTypeHandler {
  /** Build the type-specific fields from zone-file rdata */
  parse(value: string): TargetFields;
  /** Canonicalize target and ancillary fields */
  normalize(record: DnsRecord, origin: string): DnsRecord;
  /** Throws `InvalidRecordError` when the record cannot exist as written */
  validate(record: DnsRecord): void;
  /** Canonical combined rdata */
  serialize(record: DnsRecord): string;
  /**
   * Value distinguishing records within one label/type set. Fields left
   * out of it (besides TTL) are compared as ancillary data, so changing
   * them is a modify rather than a create plus delete.
   */
  identity?(record: DnsRecord): string;
}

function fail(record: Pick<DnsRecord, 'type' | 'label'>, detail: string): never {
  throw new InvalidRecordError(`${record.type} ${record.label}: ${detail}`);
}

function splitFields(value: string): string[] {
  return value.trim().split(/\s+/).filter((f) => f !== '');
}

function parseUint(raw: string | undefined, field: string, type: string): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new InvalidRecordError(`${type}: ${field} must be an unsigned integer, got "${raw ?? ''}"`);
  }
  return Number(raw);
}

function checkRange(
  record: DnsRecord,
  field: string,
  value: number | undefined,
  max: number
): void {
  if (value === undefined || !Number.isInteger(value) || value < 0 || value > max) {
    fail(record, `${field} must be an integer between 0 and ${max}`);
  }
}

const HOSTNAME = /^([^\s.]+\.)+$/;

function checkHostname(record: DnsRecord, value: string, allowRoot: boolean): void {
  if (allowRoot && value === '.') return;
  if (!HOSTNAME.test(value)) {
    fail(record, `invalid hostname "${value}"`);
  }
}

function stripQuotes(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

const address = (version: 4 | 6): RecordTypeHandler => ({
  parse: (value) => ({ target: value.trim() }),
  normalize: (record) => ({ ...record, target: record.target.trim().toLowerCase() }),
  validate(record) {
    const ok = version === 4 ? isIPv4(record.target) : isIPv6(record.target);
    if (!ok) fail(record, `invalid IPv${version} address "${record.target}"`);
  },
  serialize: (record) => record.target,
});

const hostname: RecordTypeHandler = {
  parse: (value) => ({ target: value.trim() }),
  normalize: (record, origin) => ({
    ...record,
    target: record.target.trim() === '' ? '' : qualifyHostname(record.target, origin),
  }),
  validate: (record) => checkHostname(record, record.target, false),
  serialize: (record) => record.target,
};

const mx: RecordTypeHandler = {
  parse(value) {
    const fields = splitFields(value);
    if (fields.length !== 2) {
      throw new InvalidRecordError(`MX: expected "<preference> <host>", got "${value}"`);
    }
    return {
      mxPreference: parseUint(fields[0], 'preference', 'MX'),
      target: fields[1] ?? '',
    };
  },
  normalize: (record, origin) => ({
    ...record,
    target: record.target.trim() === '' ? '' : qualifyHostname(record.target, origin),
  }),
  validate(record) {
    checkRange(record, 'preference', record.mxPreference, 65535);
    // "." is the null MX
    checkHostname(record, record.target, true);
  },
  serialize: (record) => `${record.mxPreference ?? 0} ${record.target}`,
  identity: (record) => record.target,
};

const txt: RecordTypeHandler = {
  parse: (value) => ({ target: value }),
  normalize: (record) => record,
  validate() {},
  serialize: (record) => record.target,
};

const caa: RecordTypeHandler = {
  parse(value) {
    const match = value.trim().match(/^(\S+)\s+(\S+)\s*(.*)$/);
    if (!match) {
      throw new InvalidRecordError(`CAA: expected "<flag> <tag> <value>", got "${value}"`);
    }
    return {
      caaFlag: parseUint(match[1], 'flag', 'CAA'),
      caaTag: match[2] ?? '',
      target: stripQuotes(match[3] ?? ''),
    };
  },
  normalize: (record) => ({ ...record, caaTag: record.caaTag?.toLowerCase() }),
  validate(record) {
    checkRange(record, 'flag', record.caaFlag, 255);
    if (!record.caaTag || !/^[a-z0-9]+$/.test(record.caaTag)) {
      fail(record, `invalid tag "${record.caaTag ?? ''}"`);
    }
  },
  serialize: (record) => `${record.caaFlag ?? 0} ${record.caaTag ?? ''} "${record.target}"`,
};

const srv: RecordTypeHandler = {
  parse(value) {
    const fields = splitFields(value);
    if (fields.length !== 4) {
      throw new InvalidRecordError(
        `SRV: expected "<priority> <weight> <port> <target>", got "${value}"`
      );
    }
    return {
      srvPriority: parseUint(fields[0], 'priority', 'SRV'),
      srvWeight: parseUint(fields[1], 'weight', 'SRV'),
      srvPort: parseUint(fields[2], 'port', 'SRV'),
      target: fields[3] ?? '',
    };
  },
  normalize: (record, origin) => ({
    ...record,
    target: record.target.trim() === '' ? '' : qualifyHostname(record.target, origin),
  }),
  validate(record) {
    checkRange(record, 'priority', record.srvPriority, 65535);
    checkRange(record, 'weight', record.srvWeight, 65535);
    checkRange(record, 'port', record.srvPort, 65535);
    checkHostname(record, record.target, true);
  },
  serialize: (record) =>
    `${record.srvPriority ?? 0} ${record.srvWeight ?? 0} ${record.srvPort ?? 0} ${record.target}`,
};

const redirect: RecordTypeHandler = {
  parse: (value) => ({ target: value }),
  normalize: (record) => record,
  validate(record) {
    if (record.target.trim() === '') fail(record, 'destination is empty');
  },
  serialize: (record) => record.target,
};

/** Per-type behaviour; supporting a new type means adding one entry here */
export const RECORD_HANDLERS: Readonly<Record<RecordType, RecordTypeHandler>> = {
  A: address(4),
  AAAA: address(6),
  CNAME: hostname,
  NS: hostname,
  PTR: hostname,
  ALIAS: hostname,
  MX: mx,
  TXT: txt,
  CAA: caa,
  SRV: srv,
  URL: redirect,
  URL301: redirect,
  FRAME: redirect,
};

export function recordIdentity(record: DnsRecord): string {
  const handler = RECORD_HANDLERS[record.type];
  return handler.identity ? handler.identity(record) : handler.serialize(record);
}
