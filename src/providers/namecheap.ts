import { can, cannot, defineCapabilities } from '../capabilities.js';
import { cleanDomain } from '../domain.js';
import { ConfigurationError, RateLimitError } from '../errors.js';
import type { DnsProvider, ProviderZone, Registrar } from '../provider.js';
import { isRecordType, parseRecord, recordValue } from '../record.js';
import type { DnsRecord } from '../types.js';

export interface NamecheapOptions {
  apiUser: string;
  apiKey: string;
  /** Account the calls act on; defaults to `apiUser` */
  username?: string;
  /** Whitelisted IP the calls originate from */
  clientIp: string;
  /** Override for the sandbox (`https://api.sandbox.namecheap.com/xml.response`) */
  baseUrl?: string;
}

export const NAMECHEAP_DEFAULT_NS = [
  'dns1.registrar-servers.com',
  'dns2.registrar-servers.com',
];

const NAMECHEAP_API = 'https://api.namecheap.com/xml.response';

/**
 * Namecheap fills an empty zone with a parking CNAME and a URL redirect.
 * Seeing exactly that pair means the zone is, for our purposes, empty.
 */
export function isNamecheapParkingZone(actual: readonly DnsRecord[]): boolean {
  const [first, second] = actual;
  return (
    actual.length === 2 &&
    first?.type === 'CNAME' &&
    first.target.includes('parkingpage') &&
    second?.type === 'URL'
  );
}

export const namecheapCapabilities = defineCapabilities({
  name: 'NAMECHEAP',
  supportsIncrementalCRUD: false,
  registrarControlsApexNS: true,
  defaultTtl: 1800,
  defaultNameservers: NAMECHEAP_DEFAULT_NS,
  customRecordTypes: ['URL', 'URL301', 'FRAME'],
  features: {
    CanGetZones: can(),
    CanConcur: can(),
    CanUseAlias: can(),
    CanUseCAA: can(),
    CanUsePTR: cannot(),
    CanUseSRV: cannot(
      'SRV records can be made in the web console, but the API can neither read nor set them'
    ),
    DocCreateDomains: cannot('Requires domain registered through their service'),
    DocDualHost: cannot("Doesn't allow control of apex NS records"),
    DocOfficiallySupported: cannot(),
  },
  isPlaceholderZone: isNamecheapParkingZone,
});

interface NamecheapHost {
  HostId?: string;
  Name: string;
  Type: string;
  Address: string;
  MXPref?: string;
  TTL?: string;
}

function decodeXml(s: string): string {
  return s
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

function parseAttributes(tag: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const match of tag.matchAll(/(\w+)="([^"]*)"/g)) {
    const [, name, value] = match;
    if (name !== undefined && value !== undefined) {
      attrs[name] = decodeXml(value);
    }
  }
  return attrs;
}

function findElements(xml: string, element: string): Record<string, string>[] {
  const pattern = new RegExp(`<${element}\\s([^>]*?)/?>`, 'gi');
  return [...xml.matchAll(pattern)].map((m) => parseAttributes(m[1] ?? ''));
}

function extractErrors(xml: string): string | null {
  const status = xml.match(/<ApiResponse[^>]*\sStatus="([^"]+)"/);
  if (status?.[1]?.toUpperCase() !== 'ERROR') return null;
  const errors = [...xml.matchAll(/<Error[^>]*Number="(\d+)"[^>]*>([\s\S]*?)<\/Error>/g)]
    .map((m) => `${m[1] ?? 'unknown'}: ${decodeXml(m[2] ?? '').trim()}`)
    .join(', ');
  return errors || 'unknown error';
}

function toHost(attrs: Record<string, string>): NamecheapHost {
  return {
    HostId: attrs['HostId'],
    Name: attrs['Name'] ?? '',
    Type: attrs['Type'] ?? '',
    Address: attrs['Address'] ?? '',
    MXPref: attrs['MXPref'],
    TTL: attrs['TTL'],
  };
}

/** `example.co.uk` → `{ sld: 'example', tld: 'co.uk' }` */
export function splitDomain(domain: string): { sld: string; tld: string } {
  const cleaned = cleanDomain(domain);
  const dot = cleaned.indexOf('.');
  if (dot === -1) {
    throw new ConfigurationError(`Namecheap: "${domain}" is not a registrable domain`);
  }
  return { sld: cleaned.slice(0, dot), tld: cleaned.slice(dot + 1) };
}

function hostValue(host: NamecheapHost): string {
  if (host.Type.toUpperCase() === 'MX') {
    return `${host.MXPref ?? '0'} ${host.Address}`;
  }
  return host.Address;
}

function toHostParams(records: readonly DnsRecord[]): Record<string, string> {
  const params: Record<string, string> = {};
  records.forEach((record, i) => {
    const n = i + 1;
    params[`HostName${n}`] = record.label;
    params[`RecordType${n}`] = record.type;
    params[`Address${n}`] = record.type === 'CAA' ? recordValue(record) : record.target;
    params[`MXPref${n}`] = String(record.mxPreference ?? 10);
    params[`TTL${n}`] = String(record.ttl);
  });
  if (records.some((r) => r.type === 'MX')) {
    params['EmailType'] = 'MX';
  }
  return params;
}

/**
 * Create a Namecheap adapter, usable both as DNS provider and registrar.
 *
 * Uses the Namecheap XML API with native `fetch` (Node 18+). The API has no
 * per-record calls, so every change is sent as a full host list.
 */
export function namecheap(options: NamecheapOptions): DnsProvider & Registrar {
  const { apiUser, apiKey, clientIp } = options;
  const username = options.username ?? apiUser;
  const baseUrl = options.baseUrl ?? NAMECHEAP_API;

  if (!apiUser || !apiKey) {
    throw new ConfigurationError('Namecheap: apiUser and apiKey are required');
  }
  if (!clientIp) {
    throw new ConfigurationError('Namecheap: clientIp is required');
  }

  async function ncCall(
    command: string,
    params: Record<string, string>,
    method: 'GET' | 'POST' = 'GET'
  ): Promise<string> {
    const query = new URLSearchParams({
      ApiUser: apiUser,
      ApiKey: apiKey,
      UserName: username,
      ClientIp: clientIp,
      Command: command,
      ...params,
    });

    const res =
      method === 'GET'
        ? await fetch(`${baseUrl}?${query.toString()}`)
        : await fetch(baseUrl, {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: query.toString(),
          });

    if (res.status === 405) {
      throw new RateLimitError('Namecheap: rate limit exceeded (HTTP 405)');
    }
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Namecheap: API error ${res.status}: ${text}`);
    }

    const xml = await res.text();
    const errors = extractErrors(xml);
    if (errors) {
      throw new Error(`Namecheap: API error: ${errors}`);
    }
    return xml;
  }

  return {
    name: namecheapCapabilities.name,
    descriptor: namecheapCapabilities,

    isRateLimited: (error: unknown) => error instanceof RateLimitError,

    auditRecords(records: readonly DnsRecord[]): string[] {
      return records
        .filter((r) => r.type === 'TXT' && r.target === '')
        .map((r) => `empty TXT record at ${r.label} is not supported`);
    },

    async getZoneRecords(origin: string): Promise<DnsRecord[]> {
      const { sld, tld } = splitDomain(origin);
      const xml = await ncCall('namecheap.domains.dns.getHosts', { SLD: sld, TLD: tld });

      // Host types the engine does not model (MXE and the like) are left alone
      const hosts = findElements(xml, 'host')
        .map(toHost)
        .filter((host) => isRecordType(host.Type.toUpperCase()));

      return hosts.map((host) =>
        parseRecord(
          {
            name: host.Name,
            type: host.Type,
            value: hostValue(host),
            ttl: host.TTL === undefined ? undefined : Number(host.TTL),
            id: host.HostId,
          },
          origin,
          namecheapCapabilities.defaultTtl
        )
      );
    },

    async applyFullReplace(origin: string, records: readonly DnsRecord[]): Promise<void> {
      const { sld, tld } = splitDomain(origin);
      const xml = await ncCall(
        'namecheap.domains.dns.setHosts',
        { SLD: sld, TLD: tld, ...toHostParams(records) },
        'POST'
      );
      const result = findElements(xml, 'DomainDNSSetHostsResult')[0];
      if (result?.['IsSuccess']?.toLowerCase() !== 'true') {
        throw new Error(`Namecheap: setHosts for ${cleanDomain(origin)} was not accepted`);
      }
    },

    async listZones(): Promise<ProviderZone[]> {
      const zones: ProviderZone[] = [];
      let page = 1;

      while (true) {
        const xml = await ncCall('namecheap.domains.getList', {
          Page: String(page),
          PageSize: '100',
        });
        for (const domain of findElements(xml, 'Domain')) {
          zones.push({ id: domain['ID'] ?? '', name: cleanDomain(domain['Name'] ?? '') });
        }

        const total = Number(xml.match(/<TotalItems>(\d+)<\/TotalItems>/)?.[1] ?? 0);
        if (zones.length >= total || page * 100 >= total) break;
        page++;
      }

      return zones;
    },

    async getNameservers(domain: string): Promise<string[]> {
      const xml = await ncCall('namecheap.domains.getInfo', {
        DomainName: cleanDomain(domain),
      });
      return [...xml.matchAll(/<Nameserver>([\s\S]*?)<\/Nameserver>/g)].map((m) =>
        cleanDomain(decodeXml(m[1] ?? ''))
      );
    },

    async setNameservers(domain: string, nameservers: readonly string[]): Promise<void> {
      const { sld, tld } = splitDomain(domain);
      await ncCall('namecheap.domains.dns.setCustom', {
        SLD: sld,
        TLD: tld,
        Nameservers: nameservers.join(','),
      });
    },
  };
}
