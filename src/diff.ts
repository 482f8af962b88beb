import type { ProviderDescriptor } from './capabilities.js';
import { APEX, cleanDomain } from './domain.js';
import { InvalidRecordError } from './errors.js';
import { formatRecord, recordIdentity, recordsEqual } from './record.js';
import type { ChangeSet, DnsRecord, RecordModification } from './types.js';

function groupKey(record: DnsRecord): string {
  return `${record.label} ${record.type}`;
}

function groupByKey(records: readonly DnsRecord[]): Map<string, DnsRecord[]> {
  const groups = new Map<string, DnsRecord[]>();
  for (const record of records) {
    const key = groupKey(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Orders by label, then type, then identity (plain code-unit order) */
export function compareRecords(a: DnsRecord, b: DnsRecord): number {
  return (
    compareStrings(a.label, b.label) ||
    compareStrings(a.type, b.type) ||
    compareStrings(recordIdentity(a), recordIdentity(b))
  );
}

function isApexNs(record: DnsRecord): boolean {
  return record.type === 'NS' && record.label === APEX;
}

function assertNoDuplicates(desired: readonly DnsRecord[]): void {
  const seen = new Set<string>();
  for (const record of desired) {
    const key = `${groupKey(record)} ${recordIdentity(record)}`;
    if (seen.has(key)) {
      throw new InvalidRecordError(`Duplicate record: ${formatRecord(record)}`);
    }
    seen.add(key);
  }
}

/**
 * Declared records the backend will actually hold: apex NS are dropped when
 * the registrar owns them. Bundle-only backends receive exactly this list.
 */
export function writableRecords(
  desired: readonly DnsRecord[],
  descriptor: ProviderDescriptor
): DnsRecord[] {
  if (!descriptor.registrarControlsApexNS) return [...desired];
  return desired.filter((record) => !isApexNs(record));
}

/**
 * Strip apex NS records from both sides when the registrar owns them.
 * Declared ones that differ from the backend's default delegation produce a
 * notice so the operator sees why the change was skipped.
 */
function filterApexNs(
  desired: readonly DnsRecord[],
  actual: readonly DnsRecord[],
  descriptor: ProviderDescriptor
): { desired: DnsRecord[]; actual: DnsRecord[]; notices: string[] } {
  if (!descriptor.registrarControlsApexNS) {
    return { desired: [...desired], actual: [...actual], notices: [] };
  }

  const notices: string[] = [];
  const keptDesired = desired.filter((record) => {
    if (!isApexNs(record)) return true;
    if (!descriptor.defaultNameservers.includes(cleanDomain(record.target))) {
      notices.push(
        `${record.target}: ${descriptor.name} does not support changing apex NS records. Skipping.`
      );
    }
    return false;
  });

  return {
    desired: keptDesired,
    actual: actual.filter((record) => !isApexNs(record)),
    notices,
  };
}

function diffGroup(
  desired: readonly DnsRecord[],
  actual: readonly DnsRecord[],
  changes: ChangeSet
): void {
  const remaining = [...actual];

  const unmatched = desired.filter((record) => {
    const index = remaining.findIndex((candidate) => recordsEqual(candidate, record));
    if (index === -1) return true;
    remaining.splice(index, 1);
    return false;
  });

  for (const record of unmatched) {
    const identity = recordIdentity(record);
    const index = remaining.findIndex(
      (candidate) => recordIdentity(candidate) === identity
    );
    const existing = remaining[index];
    if (existing) {
      remaining.splice(index, 1);
      changes.toModify.push({ existing, desired: record });
    } else {
      changes.toCreate.push(record);
    }
  }

  changes.toDelete.push(...remaining);
}

/**
 * Compare normalized desired and actual records for one zone.
 *
 * Records are grouped by label and type and compared as unordered sets of
 * values within each group: a value only on the desired side is a create,
 * only on the actual side a delete, and a value on both sides whose TTL or
 * ancillary fields differ is a modify. Output is sorted so repeated runs
 * over the same input describe the same changes in the same order.
 */
export function computeChangeSet(
  desiredRecords: readonly DnsRecord[],
  actualRecords: readonly DnsRecord[],
  descriptor: ProviderDescriptor
): ChangeSet {
  assertNoDuplicates(desiredRecords);

  const filtered = filterApexNs(desiredRecords, actualRecords, descriptor);
  const desired = filtered.desired;
  let actual = filtered.actual;

  if (
    desired.length === 0 &&
    actual.length > 0 &&
    descriptor.isPlaceholderZone?.(actual)
  ) {
    actual = [];
  }

  const changes: ChangeSet = {
    toCreate: [],
    toDelete: [],
    toModify: [],
    toReport: [...filtered.notices].sort(compareStrings),
  };

  const desiredGroups = groupByKey(desired);
  const actualGroups = groupByKey(actual);
  const keys = new Set([...desiredGroups.keys(), ...actualGroups.keys()]);
  for (const key of keys) {
    diffGroup(desiredGroups.get(key) ?? [], actualGroups.get(key) ?? [], changes);
  }

  changes.toCreate.sort(compareRecords);
  changes.toDelete.sort(compareRecords);
  changes.toModify.sort((a: RecordModification, b: RecordModification) =>
    compareRecords(a.desired, b.desired)
  );
  return changes;
}

/** Number of executable changes (notices excluded) */
export function changeCount(changes: ChangeSet): number {
  return changes.toCreate.length + changes.toDelete.length + changes.toModify.length;
}
