import { z } from 'zod';
import { cleanDomain } from './domain.js';
import { ConfigurationError } from './errors.js';
import type { DnsRecord, RecordType, RedirectRecordType } from './types.js';

export const CAPABILITIES = [
  'CanGetZones',
  'CanConcur',
  'CanUseAlias',
  'CanUseCAA',
  'CanUsePTR',
  'CanUseSRV',
  'DocCreateDomains',
  'DocDualHost',
  'DocOfficiallySupported',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export type Support = 'can' | 'cannot' | 'unimplemented';

export interface CapabilityStatus {
  support: Support;
  /** Free-text caveat shown when the capability is consulted */
  caveat?: string;
}

export const can = (caveat?: string): CapabilityStatus =>
  caveat === undefined ? { support: 'can' } : { support: 'can', caveat };

export const cannot = (caveat?: string): CapabilityStatus =>
  caveat === undefined ? { support: 'cannot' } : { support: 'cannot', caveat };

export const unimplemented = (caveat?: string): CapabilityStatus =>
  caveat === undefined
    ? { support: 'unimplemented' }
    : { support: 'unimplemented', caveat };

/** Static, per-backend statement of what it can do */
export interface ProviderDescriptor {
  name: string;
  /** False for bundle-only backends that only accept a full-zone replacement */
  supportsIncrementalCRUD: boolean;
  /** The registrar owns the apex NS set; declared apex NS cannot be changed */
  registrarControlsApexNS: boolean;
  /** Substituted for zero/absent TTLs */
  defaultTtl: number;
  /** Nameservers the backend delegates to by default (lowercase, no trailing dot) */
  defaultNameservers: readonly string[];
  /** Redirect pseudo-record types the backend accepts */
  customRecordTypes: readonly RedirectRecordType[];
  /** Unlisted capabilities are `cannot` */
  features: Readonly<Partial<Record<Capability, CapabilityStatus>>>;
  /**
   * Recognizes records the backend injects into an otherwise empty zone
   * (parking pages and the like).
   */
  isPlaceholderZone?: (actual: readonly DnsRecord[]) => boolean;
}

const StatusSchema = z.object({
  support: z.enum(['can', 'cannot', 'unimplemented']),
  caveat: z.string().optional(),
});

const DescriptorSchema = z.object({
  name: z.string().min(1),
  supportsIncrementalCRUD: z.boolean(),
  registrarControlsApexNS: z.boolean(),
  defaultTtl: z.number().int().positive(),
  defaultNameservers: z.array(z.string().min(1)),
  customRecordTypes: z.array(z.enum(['URL', 'URL301', 'FRAME'])),
  features: z.record(z.enum(CAPABILITIES), StatusSchema),
  isPlaceholderZone: z.function().optional(),
});

export type ProviderDescriptorInput = Omit<
  ProviderDescriptor,
  'defaultNameservers' | 'customRecordTypes'
> & {
  defaultNameservers?: readonly string[];
  customRecordTypes?: readonly RedirectRecordType[];
};

/**
 * Validate a provider's descriptor and freeze it.
 *
 * Adapters call this at module load, so a malformed table fails on startup
 * rather than in the middle of a reconciliation.
 */
export function defineCapabilities(
  input: ProviderDescriptorInput
): ProviderDescriptor {
  const result = DescriptorSchema.safeParse({
    ...input,
    defaultNameservers: input.defaultNameservers ?? [],
    customRecordTypes: input.customRecordTypes ?? [],
  });
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join(', ');
    throw new ConfigurationError(
      `Invalid capability descriptor for "${input.name}": ${details}`
    );
  }

  const descriptor: ProviderDescriptor = {
    name: input.name,
    supportsIncrementalCRUD: input.supportsIncrementalCRUD,
    registrarControlsApexNS: input.registrarControlsApexNS,
    defaultTtl: input.defaultTtl,
    defaultNameservers: Object.freeze(
      (input.defaultNameservers ?? []).map(cleanDomain)
    ),
    customRecordTypes: Object.freeze([...(input.customRecordTypes ?? [])]),
    features: Object.freeze({ ...input.features }),
  };
  if (input.isPlaceholderZone) {
    descriptor.isPlaceholderZone = input.isPlaceholderZone;
  }
  return Object.freeze(descriptor);
}

export function capability(
  descriptor: ProviderDescriptor,
  kind: Capability
): CapabilityStatus {
  return descriptor.features[kind] ?? cannot();
}

const RECORD_TYPE_CAPABILITY: Partial<Record<RecordType, Capability>> = {
  ALIAS: 'CanUseAlias',
  CAA: 'CanUseCAA',
  PTR: 'CanUsePTR',
  SRV: 'CanUseSRV',
};

const REDIRECT_TYPES: readonly RecordType[] = ['URL', 'URL301', 'FRAME'];

export function supportsRecordType(
  descriptor: ProviderDescriptor,
  type: RecordType
): CapabilityStatus {
  if (REDIRECT_TYPES.includes(type)) {
    return descriptor.customRecordTypes.some((t) => t === type)
      ? can()
      : cannot(`${type} is not a record type ${descriptor.name} offers`);
  }
  const kind = RECORD_TYPE_CAPABILITY[type];
  return kind ? capability(descriptor, kind) : can();
}

export function supportsConcurrency(descriptor: ProviderDescriptor): boolean {
  return capability(descriptor, 'CanConcur').support === 'can';
}

/**
 * Reject declared records whose type the backend cannot store. Runs before
 * any fetch.
 */
export function assertRecordTypesSupported(
  descriptor: ProviderDescriptor,
  records: readonly DnsRecord[]
): void {
  const problems = new Map<RecordType, string>();
  for (const record of records) {
    if (problems.has(record.type)) continue;
    const status = supportsRecordType(descriptor, record.type);
    if (status.support === 'can') continue;
    const note = status.caveat ? ` (${status.caveat})` : '';
    problems.set(
      record.type,
      `${record.type} records are ${status.support === 'cannot' ? 'not supported' : 'not implemented'} by ${descriptor.name}${note}`
    );
  }
  if (problems.size > 0) {
    throw new ConfigurationError([...problems.values()].join('; '));
  }
}
