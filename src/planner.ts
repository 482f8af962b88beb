import { changeCount } from './diff.js';
import { cleanDomain } from './domain.js';
import { ConfigurationError } from './errors.js';
import type { DnsProvider } from './provider.js';
import { formatRecord, recordIdentity, recordValue } from './record.js';
import type {
  ChangeSet,
  Correction,
  DnsRecord,
  ExecutableCorrection,
  RecordModification,
  ReportOnlyCorrection,
} from './types.js';

export function describeCreate(record: DnsRecord): string {
  return `+ CREATE ${formatRecord(record)}`;
}

export function describeDelete(record: DnsRecord): string {
  return `- DELETE ${formatRecord(record)}`;
}

export function describeModify({ existing, desired }: RecordModification): string {
  return (
    `± MODIFY ${desired.label} ${desired.type} ${recordIdentity(desired)}: ` +
    `(${recordValue(existing)} ttl=${existing.ttl}) -> (${recordValue(desired)} ttl=${desired.ttl})`
  );
}

export function reportCorrections(notices: readonly string[]): ReportOnlyCorrection[] {
  return notices.map((description) => ({ description, isReportOnly: true }));
}

export interface PlanInput {
  origin: string;
  changes: ChangeSet;
  /** Full desired record set, sent as-is by bundle-only backends */
  desired: readonly DnsRecord[];
  provider: DnsProvider;
}

function planIncremental({ origin, changes, provider }: PlanInput): ExecutableCorrection[] {
  const apply = provider.applyIncremental?.bind(provider);
  if (!apply) {
    throw new ConfigurationError(
      `${provider.descriptor.name}: declares incremental updates but implements no applyIncremental`
    );
  }

  return [
    ...changes.toCreate.map((record) => ({
      description: describeCreate(record),
      isReportOnly: false as const,
      action: () => apply(origin, { creates: [record], deletes: [], modifies: [] }),
    })),
    ...changes.toDelete.map((record) => ({
      description: describeDelete(record),
      isReportOnly: false as const,
      action: () => apply(origin, { creates: [], deletes: [record], modifies: [] }),
    })),
    ...changes.toModify.map((modification) => ({
      description: describeModify(modification),
      isReportOnly: false as const,
      action: () => apply(origin, { creates: [], deletes: [], modifies: [modification] }),
    })),
  ];
}

/**
 * A bundle-only backend gets one correction that replaces the whole zone.
 * Its description still lists every change for preview.
 */
function planBundle({ origin, changes, desired, provider }: PlanInput): ExecutableCorrection[] {
  if (changeCount(changes) === 0) return [];

  const replace = provider.applyFullReplace?.bind(provider);
  if (!replace) {
    throw new ConfigurationError(
      `${provider.descriptor.name}: is bundle-only but implements no applyFullReplace`
    );
  }

  const lines = [
    `GENERATE_ZONE: ${cleanDomain(origin)} (${desired.length} records)`,
    ...changes.toCreate.map(describeCreate),
    ...changes.toDelete.map(describeDelete),
    ...changes.toModify.map(describeModify),
  ];
  const records = [...desired];

  return [
    {
      description: lines.join('\n'),
      isReportOnly: false,
      action: () => replace(origin, records),
    },
  ];
}

/**
 * Turn a change set into ordered corrections: report-only notices first,
 * then either one correction per change or a single full-zone replacement,
 * depending on what the backend supports.
 */
export function planCorrections(input: PlanInput): Correction[] {
  const reports = reportCorrections(input.changes.toReport);
  const executable = input.provider.descriptor.supportsIncrementalCRUD
    ? planIncremental(input)
    : planBundle(input);
  return [...reports, ...executable];
}
