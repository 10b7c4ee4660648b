import { describe, it, expect } from 'vitest';
import {
  extractFields,
  extractOrganizationName,
  extractAddressRange,
  extractArinSummary,
} from '../../src/whois/extract.js';

const ARIN_RESPONSE = [
  'NetRange:       10.0.0.0 - 10.0.0.255',
  'CIDR:           10.0.0.0/24',
  'OrgName:        Block Holder',
  '',
  'Example Org (NET-10-0-0-0-2) 10.0.0.0 - 10.0.0.127',
  '',
].join('\n');

describe('extractOrganizationName', () => {
  it('should read OrgName', () => {
    expect(extractOrganizationName('OrgName:        Example Corp\n')).toBe('Example Corp');
  });

  it('should read descr, Registrant Organization and owner', () => {
    expect(extractOrganizationName('descr:          RIPE Example Net\n')).toBe('RIPE Example Net');
    expect(extractOrganizationName('Registrant Organization: Example Holdings\n')).toBe('Example Holdings');
    expect(extractOrganizationName('owner:       Exemplo Ltda\n')).toBe('Exemplo Ltda');
  });

  it('should prefer the primary labels over Organization', () => {
    const raw = 'Organization:   Fallback Org\ndescr:          Primary Org\n';
    expect(extractOrganizationName(raw)).toBe('Primary Org');
  });

  it('should fall back to Organization and org-name', () => {
    expect(extractOrganizationName('Organization:   Fallback Org\n')).toBe('Fallback Org');
    expect(extractOrganizationName('org-name:       Example GmbH\n')).toBe('Example GmbH');
  });

  it('should read the JPNIC bracket label', () => {
    const raw = 'a. [IPネットワークアドレス]     192.0.2.0/24\nf. [組織名]                  テスト株式会社\n';
    expect(extractOrganizationName(raw)).toBe('テスト株式会社');
  });

  it('should return an empty string without a match', () => {
    expect(extractOrganizationName('% no objects found\n')).toBe('');
  });
});

describe('extractAddressRange', () => {
  it('should read NetRange', () => {
    expect(extractAddressRange('NetRange:       10.0.0.0 - 10.0.0.255\n')?.toJSON())
      .toEqual({ begin: '10.0.0.0', end: '10.0.0.255' });
  });

  it('should read inetnum and inet6num', () => {
    expect(extractAddressRange('inetnum:        193.0.0.0 - 193.0.7.255\n')?.toString()).toBe('193.0.0.0/21');
    expect(extractAddressRange('inet6num:       2001:db8::/32\n')?.toString()).toBe('2001:db8::/32');
  });

  it('should read the JPNIC bracket label', () => {
    const raw = 'a. [IPネットワークアドレス]     192.0.2.0/24\n';
    expect(extractAddressRange(raw)?.toJSON()).toEqual({ begin: '192.0.2.0', end: '192.0.2.255' });
  });

  it('should treat an unparseable value as a miss', () => {
    expect(extractAddressRange('CIDR:           8.0.0.0/9, 8.128.0.0/10\n')).toBeUndefined();
  });

  it('should return undefined without a match', () => {
    expect(extractAddressRange('OrgName: Example Corp\n')).toBeUndefined();
  });
});

describe('extractArinSummary', () => {
  it('should take the last summary line', () => {
    const summary = extractArinSummary(ARIN_RESPONSE);
    expect(summary?.organizationName).toBe('Example Org (NET-10-0-0-0-2)');
    expect(summary?.addressRange.toJSON()).toEqual({ begin: '10.0.0.0', end: '10.0.0.127' });
  });

  it('should ignore a bare NetRange line', () => {
    expect(extractArinSummary('NetRange:       10.0.0.0 - 10.0.0.255\n')).toBeUndefined();
  });
});

describe('extractFields', () => {
  it('should combine OrgName and NetRange', () => {
    const fields = extractFields(
      'OrgName:        Example Corp\nNetRange:       10.0.0.0 - 10.0.0.255\n',
      ['whois.iana.org', 'whois.example.net']
    );
    expect(fields.organizationName).toBe('Example Corp');
    expect(fields.addressRange?.toJSON()).toEqual({ begin: '10.0.0.0', end: '10.0.0.255' });
  });

  it('should let the ARIN summary line override the block', () => {
    const fields = extractFields(ARIN_RESPONSE, ['whois.iana.org', 'whois.arin.net']);
    expect(fields.organizationName).toBe('Example Org (NET-10-0-0-0-2)');
    expect(fields.addressRange?.toString()).toBe('10.0.0.0/25');
  });

  it('should not apply the summary line for other registries', () => {
    const fields = extractFields(ARIN_RESPONSE, ['whois.iana.org', 'whois.ripe.net']);
    expect(fields.organizationName).toBe('Block Holder');
    expect(fields.addressRange?.toString()).toBe('10.0.0.0/24');
  });

  it('should keep the block values when the last ARIN line is a label', () => {
    const raw = 'OrgName:        Block Holder\nNetRange:       10.0.0.0 - 10.0.0.255\n';
    const fields = extractFields(raw, ['whois.arin.net']);
    expect(fields.organizationName).toBe('Block Holder');
    expect(fields.addressRange?.toString()).toBe('10.0.0.0/24');
  });

  it('should leave both fields empty without matches', () => {
    expect(extractFields('', ['whois.iana.org'])).toEqual({ organizationName: '', addressRange: undefined });
  });
});
