/**
 * Live run: bring a Namecheap zone in line with a small declaration.
 *
 * Usage:
 *   NAMECHEAP_API_USER=xxx NAMECHEAP_API_KEY=xxx NAMECHEAP_CLIENT_IP=x.x.x.x \
 *     npx tsx examples/reconcile.ts example.com [--apply]
 */

import { reconcileNameservers, reconcileZone, type ZoneDeclaration } from '../src/index.js';
import { namecheap } from '../src/providers/namecheap.js';

const domain = process.argv[2];
const apply = process.argv.includes('--apply');
const apiUser = process.env['NAMECHEAP_API_USER'];
const apiKey = process.env['NAMECHEAP_API_KEY'];
const clientIp = process.env['NAMECHEAP_CLIENT_IP'];

if (!domain) {
  console.error('Usage: npx tsx examples/reconcile.ts <domain> [--apply]');
  process.exit(1);
}

if (!apiUser || !apiKey || !clientIp) {
  console.error('Missing NAMECHEAP_API_USER, NAMECHEAP_API_KEY or NAMECHEAP_CLIENT_IP.');
  console.error('Enable API access at: https://ap.www.namecheap.com/settings/tools/apiaccess/');
  console.error('The client IP must be whitelisted there.');
  process.exit(1);
}

const zone: ZoneDeclaration = {
  origin: domain,
  records: [
    { name: '@', type: 'A', value: '192.0.2.1' },
    { name: 'www', type: 'CNAME', value: '@' },
    { name: '@', type: 'MX', value: '10 mail' },
    { name: '@', type: 'TXT', value: 'v=spf1 mx -all' },
  ],
  nameservers: ['dns1.registrar-servers.com', 'dns2.registrar-servers.com'],
};

async function main(user: string, key: string, ip: string) {
  const provider = namecheap({ apiUser: user, apiKey: key, clientIp: ip });

  console.log(`\nChecking delegation for ${domain}...`);
  const ns = await reconcileNameservers(zone, provider, { preview: !apply });
  for (const c of ns.corrections) {
    console.log(`  ${c.description}`);
  }

  console.log(`\nComputing corrections for ${domain}${apply ? '' : ' (preview)'}...`);
  const result = await reconcileZone(zone, provider, { preview: !apply });

  if (result.corrections.length === 0) {
    console.log('  Zone is up to date.');
    return;
  }
  for (const c of result.corrections) {
    console.log(`  ${c.description.split('\n').join('\n  ')}`);
  }

  const failed = result.results.filter((r) => r.status === 'failed');
  for (const r of failed) {
    console.log(`  [failed] ${r.error?.message ?? r.description}`);
  }

  if (apply) {
    console.log(`\nDone! ${result.results.length - failed.length} applied, ${failed.length} failed.`);
  } else {
    console.log('\nRe-run with --apply to execute.');
  }
}

main(apiUser, apiKey, clientIp).catch((err: unknown) => {
  console.error('\nError:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
