import { can, cannot, defineCapabilities, unimplemented } from '../capabilities.js';
import { cleanDomain } from '../domain.js';
import { ConfigurationError, RateLimitError } from '../errors.js';
import type { DnsProvider, IncrementalChanges, ProviderZone } from '../provider.js';
import { formatRecord, isRecordType, parseRecord, recordValue } from '../record.js';
import type { DnsRecord } from '../types.js';

export interface HetznerOptions {
  apiToken: string;
  /** Known zone IDs by origin; other zones are looked up by name */
  zoneIds?: Record<string, string>;
}

export interface HetznerZone {
  id: string;
  name: string;
}

interface HetznerDnsRecord {
  id: string;
  type: string;
  name: string;
  value: string;
  zone_id: string;
  ttl?: number;
}

const HETZNER_API = 'https://dns.hetzner.com/api/v1';

/** Apex NS Hetzner publishes for every zone and manages itself */
export const HETZNER_DEFAULT_NS = [
  'hydrogen.ns.hetzner.com',
  'oxygen.ns.hetzner.com',
  'helium.ns.hetzner.de',
];

export const hetznerCapabilities = defineCapabilities({
  name: 'HETZNER',
  supportsIncrementalCRUD: true,
  registrarControlsApexNS: true,
  defaultTtl: 86400,
  defaultNameservers: HETZNER_DEFAULT_NS,
  features: {
    CanGetZones: can(),
    CanConcur: unimplemented(),
    CanUseAlias: cannot(),
    CanUseCAA: can(),
    CanUsePTR: cannot(),
    CanUseSRV: can(),
    DocCreateDomains: can(),
    DocDualHost: can(),
    DocOfficiallySupported: cannot(),
  },
});

async function hetznerFetchWithToken<T>(
  apiToken: string,
  path: string,
  init?: RequestInit
): Promise<T> {
  const headers = new Headers(init?.headers);
  headers.set('Auth-API-Token', apiToken);
  headers.set('Content-Type', 'application/json');

  const res = await fetch(`${HETZNER_API}${path}`, {
    ...init,
    headers,
  });

  if (res.status === 429) {
    throw new RateLimitError('Hetzner: rate limit exceeded (HTTP 429)');
  }
  if (!res.ok) {
    const text = await res.text();
    throw new Error(`Hetzner: API error ${res.status}: ${text}`);
  }

  return (await res.json()) as T;
}

/**
 * List all zones (domains) accessible with the given API token.
 */
export async function listHetznerZones(
  apiToken: string
): Promise<HetznerZone[]> {
  if (!apiToken) {
    throw new ConfigurationError('Hetzner: apiToken is required');
  }

  const data = await hetznerFetchWithToken<{ zones: HetznerZone[] }>(
    apiToken,
    '/zones'
  );

  return data.zones.map((z) => ({ id: z.id, name: z.name }));
}

function requireId(record: DnsRecord): string {
  if (!record.id) {
    throw new Error(`Hetzner: record has no id: ${formatRecord(record)}`);
  }
  return record.id;
}

/**
 * Create a Hetzner DNS provider adapter.
 *
 * Uses Hetzner DNS API v1 with native `fetch` (Node 18+). Every record is
 * created, updated and deleted on its own.
 */
export function hetzner(options: HetznerOptions): DnsProvider {
  const { apiToken } = options;
  const zoneIds = new Map<string, string>(
    Object.entries(options.zoneIds ?? {}).map(([name, id]) => [cleanDomain(name), id])
  );
  const lookups = new Map<string, Promise<string>>();

  if (!apiToken) {
    throw new ConfigurationError('Hetzner: apiToken is required');
  }

  function hFetch<T>(path: string, init?: RequestInit) {
    return hetznerFetchWithToken<T>(apiToken, path, init);
  }

  async function lookupZoneId(domain: string): Promise<string> {
    const data = await hFetch<{ zones: { id: string; name: string }[] }>(
      `/zones?name=${encodeURIComponent(domain)}`
    );

    const zone = data.zones[0];
    if (!zone) {
      throw new Error(`Hetzner: no zone found for domain "${domain}"`);
    }

    zoneIds.set(domain, zone.id);
    return zone.id;
  }

  function getZoneId(origin: string): Promise<string> {
    const domain = cleanDomain(origin);
    const known = zoneIds.get(domain);
    if (known) return Promise.resolve(known);
    let pending = lookups.get(domain);
    if (!pending) {
      pending = lookupZoneId(domain).finally(() => lookups.delete(domain));
      lookups.set(domain, pending);
    }
    return pending;
  }

  function toBody(zoneId: string, record: DnsRecord): string {
    return JSON.stringify({
      zone_id: zoneId,
      type: record.type,
      name: record.label,
      value: recordValue(record),
      ttl: record.ttl,
    });
  }

  return {
    descriptor: hetznerCapabilities,

    isRateLimited: (error: unknown) => error instanceof RateLimitError,

    async getZoneRecords(origin: string): Promise<DnsRecord[]> {
      const zoneId = await getZoneId(origin);
      const data = await hFetch<{ records: HetznerDnsRecord[] }>(
        `/records?zone_id=${encodeURIComponent(zoneId)}`
      );

      // SOA and types the engine does not model are left alone
      return data.records
        .filter((r) => isRecordType(r.type.toUpperCase()))
        .map((r) =>
          parseRecord(
            { id: r.id, type: r.type, name: r.name, value: r.value, ttl: r.ttl },
            origin,
            hetznerCapabilities.defaultTtl
          )
        );
    },

    async applyIncremental(origin: string, changes: IncrementalChanges): Promise<void> {
      const zoneId = await getZoneId(origin);

      for (const record of changes.deletes) {
        await hFetch(`/records/${requireId(record)}`, { method: 'DELETE' });
      }
      for (const record of changes.creates) {
        await hFetch('/records', { method: 'POST', body: toBody(zoneId, record) });
      }
      for (const { existing, desired } of changes.modifies) {
        await hFetch(`/records/${requireId(existing)}`, {
          method: 'PUT',
          body: toBody(zoneId, desired),
        });
      }
    },

    async listZones(): Promise<ProviderZone[]> {
      return listHetznerZones(apiToken);
    },
  };
}
