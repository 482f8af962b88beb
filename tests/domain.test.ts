import { describe, it, expect } from 'vitest';
import { cleanDomain, qualifyHostname, toFqdn, toLabel } from '../src/domain.js';
import { InvalidRecordError } from '../src/errors.js';

describe('cleanDomain', () => {
  it('returns bare domain as-is', () => {
    expect(cleanDomain('example.com')).toBe('example.com');
  });

  it('lowercases domain', () => {
    expect(cleanDomain('EXAMPLE.COM')).toBe('example.com');
  });

  it('removes trailing dot (FQDN)', () => {
    expect(cleanDomain('example.com.')).toBe('example.com');
  });

  it('trims whitespace', () => {
    expect(cleanDomain('  example.com  ')).toBe('example.com');
  });

  it('keeps the www label', () => {
    expect(cleanDomain('www.example.com')).toBe('www.example.com');
  });
});

describe('toLabel', () => {
  it('folds the origin to the apex label', () => {
    expect(toLabel('example.com', 'example.com')).toBe('@');
    expect(toLabel('Example.COM.', 'example.com')).toBe('@');
    expect(toLabel('@', 'example.com')).toBe('@');
    expect(toLabel('', 'example.com')).toBe('@');
  });

  it('strips the origin from qualified names', () => {
    expect(toLabel('WWW.example.com.', 'example.com')).toBe('www');
    expect(toLabel('a.b.example.com', 'example.com.')).toBe('a.b');
  });

  it('keeps relative labels', () => {
    expect(toLabel('Mail', 'example.com')).toBe('mail');
    expect(toLabel('_dmarc', 'example.com')).toBe('_dmarc');
  });

  it('rejects a fully qualified name outside the zone', () => {
    expect(() => toLabel('www.example.org.', 'example.com')).toThrow(
      InvalidRecordError
    );
    expect(() => toLabel('www.example.org.', 'example.com')).toThrow(
      'Name "www.example.org." is outside of zone "example.com"'
    );
  });
});

describe('toFqdn', () => {
  it('expands labels against the origin', () => {
    expect(toFqdn('@', 'example.com.')).toBe('example.com');
    expect(toFqdn('www', 'example.com')).toBe('www.example.com');
  });
});

describe('qualifyHostname', () => {
  it('qualifies relative names', () => {
    expect(qualifyHostname('mail', 'example.com')).toBe('mail.example.com.');
  });

  it('expands @ to the origin', () => {
    expect(qualifyHostname('@', 'Example.com')).toBe('example.com.');
  });

  it('lowercases fully qualified names', () => {
    expect(qualifyHostname('Mail.Example.NET.', 'example.com')).toBe(
      'mail.example.net.'
    );
  });
});
