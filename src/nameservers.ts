import { cleanDomain } from './domain.js';
import { FetchError, errorMessage } from './errors.js';
import type { Registrar } from './provider.js';
import type { RetryPolicy } from './retry.js';
import type { Correction } from './types.js';

/** Lowercase, strip trailing dots, sort; order never matters for delegation */
export function canonicalNameservers(nameservers: readonly string[]): string[] {
  return nameservers.map(cleanDomain).filter((ns) => ns !== '').sort();
}

/**
 * Compare a domain's delegated nameservers with the declared set and return
 * at most one correction that submits the declared list.
 */
export async function getRegistrarCorrections(
  domain: string,
  desiredNameservers: readonly string[],
  registrar: Registrar,
  retry: RetryPolicy
): Promise<Correction[]> {
  let current: string[];
  try {
    current = await retry.run(() => registrar.getNameservers(domain));
  } catch (err) {
    throw new FetchError(
      `${registrar.name}: failed to fetch nameservers for ${domain}: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  const desiredList = canonicalNameservers(desiredNameservers);
  const found = canonicalNameservers(current).join(',');
  const desired = desiredList.join(',');
  if (found === desired) return [];

  return [
    {
      description: `Change Nameservers from '${found}' to '${desired}'`,
      isReportOnly: false,
      action: () => registrar.setNameservers(domain, desiredList),
    },
  ];
}
