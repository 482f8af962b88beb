import { toLabel } from './domain.js';
import { InvalidRecordError } from './errors.js';
import { RECORD_HANDLERS, recordIdentity } from './record-types.js';
import { RECORD_TYPES, type DnsRecord, type RecordInput, type RecordType } from './types.js';

const MAX_TTL = 2 ** 31 - 1;

export function isRecordType(type: string): type is RecordType {
  return RECORD_TYPES.some((t) => t === type);
}

function toRecordType(type: string): RecordType {
  const upper = type.trim().toUpperCase();
  if (!isRecordType(upper)) {
    throw new InvalidRecordError(`Unknown record type "${type}"`);
  }
  return upper;
}

/** A zero or absent TTL means "provider default", not a real value */
function resolveTtl(ttl: number | undefined, defaultTtl: number, where: string): number {
  if (ttl === undefined || ttl === 0) return defaultTtl;
  if (!Number.isInteger(ttl) || ttl < 0 || ttl > MAX_TTL) {
    throw new InvalidRecordError(`${where}: invalid TTL ${ttl}`);
  }
  return ttl;
}

/**
 * Build a canonical record from a name/type/rdata triple, as found in a
 * declaration or a provider API response.
 */
export function parseRecord(
  input: RecordInput,
  origin: string,
  defaultTtl: number
): DnsRecord {
  const type = toRecordType(input.type);
  const fields = RECORD_HANDLERS[type].parse(input.value);
  const record: DnsRecord = {
    ...fields,
    label: toLabel(input.name, origin),
    type,
    ttl: input.ttl ?? 0,
  };
  if (input.id !== undefined) record.id = input.id;
  return normalizeRecord(record, origin, defaultTtl);
}

/**
 * Canonicalize a record: label folded to the origin, target rewritten per
 * type, TTL defaulted. Idempotent; throws `InvalidRecordError` instead of
 * coercing a malformed value.
 */
export function normalizeRecord(
  record: DnsRecord,
  origin: string,
  defaultTtl: number
): DnsRecord {
  const type = toRecordType(record.type);
  const handler = RECORD_HANDLERS[type];
  const label = toLabel(record.label, origin);
  const normalized = handler.normalize(
    {
      ...record,
      label,
      type,
      ttl: resolveTtl(record.ttl, defaultTtl, `${type} ${label}`),
    },
    origin
  );
  handler.validate(normalized);
  return normalized;
}

export function isRecordInput(value: RecordInput | DnsRecord): value is RecordInput {
  return 'value' in value && 'name' in value;
}

/** Canonical record from either a raw input or an already-structured record */
export function toCanonicalRecord(
  value: RecordInput | DnsRecord,
  origin: string,
  defaultTtl: number
): DnsRecord {
  return isRecordInput(value)
    ? parseRecord(value, origin, defaultTtl)
    : normalizeRecord(value, origin, defaultTtl);
}

/** Combined rdata, e.g. `10 mail.example.com.` */
export function recordValue(record: DnsRecord): string {
  return RECORD_HANDLERS[record.type].serialize(record);
}

/** One-line rendering used in correction descriptions */
export function formatRecord(record: DnsRecord): string {
  return `${record.label} ${record.type} ${recordValue(record)} ttl=${record.ttl}`;
}

/** Equal in everything the backend stores (the provider id is ignored) */
export function recordsEqual(a: DnsRecord, b: DnsRecord): boolean {
  return (
    a.label === b.label &&
    a.type === b.type &&
    a.ttl === b.ttl &&
    recordValue(a) === recordValue(b)
  );
}

export { recordIdentity };
