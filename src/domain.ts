import { InvalidRecordError } from './errors.js';

/** Apex sentinel label */
export const APEX = '@';

/**
 * Clean a domain or hostname: trim, lowercase, drop the trailing dot.
 *
 * Examples:
 * - `Example.COM.` → `example.com`
 * - ` ns1.example.net ` → `ns1.example.net`
 */
export function cleanDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  // Remove trailing dot (FQDN notation)
  if (domain.endsWith('.')) {
    domain = domain.slice(0, -1);
  }

  return domain;
}

/**
 * Fold a record name back to a label relative to the zone origin.
 *
 * - `example.com`, `example.com.`, `@` and `` → `@`
 * - `www.example.com.` and `WWW` → `www`
 *
 * A fully qualified name (trailing dot) outside the origin is rejected.
 */
export function toLabel(name: string, origin: string): string {
  const zone = cleanDomain(origin);
  const raw = name.trim().toLowerCase();
  const qualified = raw.endsWith('.');
  const bare = cleanDomain(raw);

  if (bare === '' || bare === APEX || bare === zone) return APEX;

  const suffix = `.${zone}`;
  if (bare.endsWith(suffix)) {
    return bare.slice(0, -suffix.length);
  }

  if (qualified) {
    throw new InvalidRecordError(
      `Name "${name}" is outside of zone "${zone}"`
    );
  }
  return bare;
}

/** Inverse of `toLabel`: `www` + `example.com` → `www.example.com` */
export function toFqdn(label: string, origin: string): string {
  const zone = cleanDomain(origin);
  return label === APEX ? zone : `${label}.${zone}`;
}

/**
 * Canonical form of a hostname target: lowercase with a trailing dot.
 * Relative names are qualified against the origin; `@` is the origin.
 */
export function qualifyHostname(target: string, origin: string): string {
  const raw = target.trim().toLowerCase();
  if (raw === APEX) return `${cleanDomain(origin)}.`;
  if (raw.endsWith('.')) return raw;
  return `${raw}.${cleanDomain(origin)}.`;
}
