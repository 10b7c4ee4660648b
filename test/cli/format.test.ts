import { describe, it, expect } from 'vitest';
import { formatReport, toReport } from '../../src/cli/format.js';
import { createLookupResult } from '../../src/whois/response.js';

const stripAnsi = (text: string) => text.replace(/\x1b\[\d+m/g, '');

describe('CLI formatting', () => {
  const result = createLookupResult(
    ['whois.iana.org', 'whois.ripe.net'],
    'descr:          Example Net\ninetnum:        193.0.0.0 - 193.0.7.255\n\n\n'
  );

  describe('formatReport', () => {
    it('should print the chain, fields and raw text', () => {
      expect(stripAnsi(formatReport('193.0.0.1', result)).split('\n')).toEqual([
        'WHOIS 193.0.0.1',
        '',
        'Servers:       whois.iana.org → whois.ripe.net',
        'Organization:  Example Net',
        'Address range: 193.0.0.0/21',
        '',
        'descr:          Example Net',
        'inetnum:        193.0.0.0 - 193.0.7.255',
        '',
      ]);
    });

    it('should mark missing fields and empty responses', () => {
      const empty = createLookupResult(['whois.iana.org'], '');

      expect(stripAnsi(formatReport('example.com', empty)).split('\n')).toEqual([
        'WHOIS example.com',
        '',
        'Servers:       whois.iana.org',
        'Organization:  N/A',
        'Address range: N/A',
        '',
        '(empty response)',
        '',
      ]);
    });
  });

  describe('toReport', () => {
    it('should build a JSON-friendly report', () => {
      expect(toReport(result)).toEqual({
        respondedServers: ['whois.iana.org', 'whois.ripe.net'],
        organizationName: 'Example Net',
        addressRange: { begin: '193.0.0.0', end: '193.0.7.255', notation: '193.0.0.0/21' },
        raw: 'descr:          Example Net\ninetnum:        193.0.0.0 - 193.0.7.255\n\n\n',
      });
    });

    it('should use null for missing fields', () => {
      const report = toReport(createLookupResult(['whois.iana.org'], ''));
      expect(report.organizationName).toBeNull();
      expect(report.addressRange).toBeNull();
    });
  });
});
