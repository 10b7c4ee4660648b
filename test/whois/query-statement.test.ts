import { describe, it, expect } from 'vitest';
import { buildQueryStatement } from '../../src/whois/query-statement.js';

describe('buildQueryStatement', () => {
  it('should prefix "domain" for Verisign and InterNIC', () => {
    expect(buildQueryStatement('whois.verisign-grs.com', 'example.com')).toBe('domain example.com');
    expect(buildQueryStatement('whois.internic.net', 'example.com')).toBe('domain example.com');
  });

  it('should prefix "n +" for ARIN', () => {
    expect(buildQueryStatement('whois.arin.net', '192.0.2.1')).toBe('n + 192.0.2.1');
  });

  it('should match server names case-insensitively', () => {
    expect(buildQueryStatement('WHOIS.ARIN.NET', '192.0.2.1')).toBe('n + 192.0.2.1');
  });

  it('should send the query unchanged to other servers', () => {
    expect(buildQueryStatement('whois.iana.org', 'example.com')).toBe('example.com');
    expect(buildQueryStatement('whois.ripe.net', '193.0.0.1')).toBe('193.0.0.1');
  });
});
