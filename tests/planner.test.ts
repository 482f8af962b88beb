import { describe, it, expect, vi } from 'vitest';
import { defineCapabilities } from '../src/capabilities.js';
import { ConfigurationError } from '../src/errors.js';
import { planCorrections } from '../src/planner.js';
import type { DnsProvider } from '../src/provider.js';
import { parseRecord } from '../src/record.js';
import type { ChangeSet, DnsRecord } from '../src/types.js';

const ORIGIN = 'example.com';

function rec(name: string, type: string, value: string, ttl = 300): DnsRecord {
  return parseRecord({ name, type, value, ttl }, ORIGIN, 300);
}

function createProvider(incremental: boolean) {
  const applyIncremental = vi.fn(async () => {});
  const applyFullReplace = vi.fn(async () => {});
  const provider: DnsProvider = {
    descriptor: defineCapabilities({
      name: incremental ? 'INCREMENTAL' : 'BUNDLE',
      supportsIncrementalCRUD: incremental,
      registrarControlsApexNS: false,
      defaultTtl: 300,
      features: {},
    }),
    getZoneRecords: async () => [],
    applyIncremental,
    applyFullReplace,
  };
  return { provider, applyIncremental, applyFullReplace };
}

const created = rec('www', 'A', '192.0.2.10');
const deleted = rec('old', 'A', '192.0.2.20');
const modified = {
  existing: rec('@', 'A', '192.0.2.1', 300),
  desired: rec('@', 'A', '192.0.2.1', 600),
};

function sampleChanges(): ChangeSet {
  return {
    toCreate: [created],
    toDelete: [deleted],
    toModify: [modified],
    toReport: ['ns1.other.net.: TEST does not support changing apex NS records. Skipping.'],
  };
}

const empty: ChangeSet = { toCreate: [], toDelete: [], toModify: [], toReport: [] };

describe('planCorrections', () => {
  describe('incremental providers', () => {
    it('emits reports first, then one correction per change', () => {
      const { provider } = createProvider(true);

      const corrections = planCorrections({
        origin: ORIGIN,
        changes: sampleChanges(),
        desired: [created, modified.desired],
        provider,
      });

      expect(corrections.map((c) => c.description)).toEqual([
        'ns1.other.net.: TEST does not support changing apex NS records. Skipping.',
        '+ CREATE www A 192.0.2.10 ttl=300',
        '- DELETE old A 192.0.2.20 ttl=300',
        '± MODIFY @ A 192.0.2.1: (192.0.2.1 ttl=300) -> (192.0.2.1 ttl=600)',
      ]);
      expect(corrections.map((c) => c.isReportOnly)).toEqual([true, false, false, false]);
    });

    it('carries only the minimal change in each action', async () => {
      const { provider, applyIncremental } = createProvider(true);
      const corrections = planCorrections({
        origin: ORIGIN,
        changes: sampleChanges(),
        desired: [],
        provider,
      });

      for (const correction of corrections) {
        if (!correction.isReportOnly) await correction.action();
      }

      expect(applyIncremental.mock.calls).toEqual([
        [ORIGIN, { creates: [created], deletes: [], modifies: [] }],
        [ORIGIN, { creates: [], deletes: [deleted], modifies: [] }],
        [ORIGIN, { creates: [], deletes: [], modifies: [modified] }],
      ]);
    });

    it('produces nothing for an empty change set', () => {
      const { provider } = createProvider(true);
      expect(planCorrections({ origin: ORIGIN, changes: empty, desired: [], provider })).toEqual([]);
    });

    it('rejects a provider without applyIncremental', () => {
      const { provider } = createProvider(true);
      const broken: DnsProvider = {
        descriptor: provider.descriptor,
        getZoneRecords: provider.getZoneRecords,
      };
      expect(() =>
        planCorrections({ origin: ORIGIN, changes: sampleChanges(), desired: [], provider: broken })
      ).toThrow(ConfigurationError);
    });
  });

  describe('bundle-only providers', () => {
    it('emits a single correction listing every change', () => {
      const { provider } = createProvider(false);
      const desired = [created, modified.desired, rec('mail', 'A', '192.0.2.30')];

      const corrections = planCorrections({
        origin: 'Example.com.',
        changes: sampleChanges(),
        desired,
        provider,
      });

      expect(corrections).toHaveLength(2);
      expect(corrections[0]?.isReportOnly).toBe(true);
      expect(corrections[1]?.description).toBe(
        [
          'GENERATE_ZONE: example.com (3 records)',
          '+ CREATE www A 192.0.2.10 ttl=300',
          '- DELETE old A 192.0.2.20 ttl=300',
          '± MODIFY @ A 192.0.2.1: (192.0.2.1 ttl=300) -> (192.0.2.1 ttl=600)',
        ].join('\n')
      );
    });

    it('replaces the whole zone with the desired records', async () => {
      const { provider, applyFullReplace } = createProvider(false);
      const desired = [created, modified.desired];

      const [, bundle] = planCorrections({
        origin: ORIGIN,
        changes: sampleChanges(),
        desired,
        provider,
      });
      if (!bundle || bundle.isReportOnly) throw new Error('expected an executable correction');
      await bundle.action();

      expect(applyFullReplace).toHaveBeenCalledTimes(1);
      expect(applyFullReplace).toHaveBeenCalledWith(ORIGIN, desired);
    });

    it('produces nothing for an empty change set', () => {
      const { provider, applyFullReplace } = createProvider(false);

      expect(planCorrections({ origin: ORIGIN, changes: empty, desired: [created], provider })).toEqual([]);
      expect(applyFullReplace).not.toHaveBeenCalled();
    });

    it('still surfaces notices when nothing is executable', () => {
      const { provider } = createProvider(false);
      const changes: ChangeSet = { ...empty, toReport: ['skipped'] };

      expect(planCorrections({ origin: ORIGIN, changes, desired: [], provider })).toEqual([
        { description: 'skipped', isReportOnly: true },
      ]);
    });
  });
});
