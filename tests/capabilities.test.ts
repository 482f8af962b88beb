import { describe, it, expect } from 'vitest';
import {
  assertRecordTypesSupported,
  can,
  cannot,
  capability,
  defineCapabilities,
  supportsConcurrency,
  supportsRecordType,
  unimplemented,
} from '../src/capabilities.js';
import { ConfigurationError } from '../src/errors.js';
import { parseRecord } from '../src/record.js';

const base = {
  name: 'TEST',
  supportsIncrementalCRUD: true,
  registrarControlsApexNS: false,
  defaultTtl: 300,
};

describe('defineCapabilities', () => {
  it('cleans default nameservers and freezes the descriptor', () => {
    const descriptor = defineCapabilities({
      ...base,
      defaultNameservers: ['NS1.Example.NET.'],
      features: {},
    });

    expect(descriptor.defaultNameservers).toEqual(['ns1.example.net']);
    expect(descriptor.customRecordTypes).toEqual([]);
    expect(Object.isFrozen(descriptor)).toBe(true);
  });

  it('rejects an invalid descriptor', () => {
    const define = () => defineCapabilities({ ...base, defaultTtl: 0, features: {} });
    expect(define).toThrow(ConfigurationError);
    expect(define).toThrow('Invalid capability descriptor for "TEST": defaultTtl');
  });
});

describe('capability', () => {
  it('defaults unlisted capabilities to cannot', () => {
    const descriptor = defineCapabilities({ ...base, features: {} });
    expect(capability(descriptor, 'CanUseSRV')).toEqual({ support: 'cannot' });
  });
});

describe('supportsRecordType', () => {
  const descriptor = defineCapabilities({
    ...base,
    customRecordTypes: ['URL'],
    features: {
      CanUseCAA: can(),
      CanUseSRV: cannot('no api'),
      CanUsePTR: unimplemented(),
    },
  });

  it('always supports the base types', () => {
    for (const type of ['A', 'AAAA', 'CNAME', 'MX', 'TXT', 'NS'] as const) {
      expect(supportsRecordType(descriptor, type).support).toBe('can');
    }
  });

  it('maps optional types to their capability', () => {
    expect(supportsRecordType(descriptor, 'CAA')).toEqual({ support: 'can' });
    expect(supportsRecordType(descriptor, 'SRV')).toEqual({ support: 'cannot', caveat: 'no api' });
    expect(supportsRecordType(descriptor, 'PTR')).toEqual({ support: 'unimplemented' });
    expect(supportsRecordType(descriptor, 'ALIAS')).toEqual({ support: 'cannot' });
  });

  it('accepts redirect types only when the provider lists them', () => {
    expect(supportsRecordType(descriptor, 'URL').support).toBe('can');
    expect(supportsRecordType(descriptor, 'FRAME').support).toBe('cannot');
  });
});

describe('assertRecordTypesSupported', () => {
  const descriptor = defineCapabilities({
    ...base,
    features: { CanUseSRV: cannot('no api'), CanUsePTR: unimplemented() },
  });

  it('passes when every type is supported', () => {
    const records = [parseRecord({ name: 'www', type: 'A', value: '192.0.2.1' }, 'example.com', 300)];
    expect(() => assertRecordTypesSupported(descriptor, records)).not.toThrow();
  });

  it('names each unsupported type once', () => {
    const records = [
      parseRecord({ name: '_a._tcp', type: 'SRV', value: '1 1 80 a' }, 'example.com', 300),
      parseRecord({ name: '_b._tcp', type: 'SRV', value: '1 1 80 b' }, 'example.com', 300),
      parseRecord({ name: '1', type: 'PTR', value: 'host' }, 'example.com', 300),
    ];
    expect(() => assertRecordTypesSupported(descriptor, records)).toThrow(
      'SRV records are not supported by TEST (no api); PTR records are not implemented by TEST'
    );
  });
});

describe('supportsConcurrency', () => {
  it('requires an explicit can', () => {
    expect(supportsConcurrency(defineCapabilities({ ...base, features: { CanConcur: can() } }))).toBe(true);
    expect(
      supportsConcurrency(defineCapabilities({ ...base, features: { CanConcur: unimplemented() } }))
    ).toBe(false);
    expect(supportsConcurrency(defineCapabilities({ ...base, features: {} }))).toBe(false);
  });
});
