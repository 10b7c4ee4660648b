/**
 * Organization and address-range extraction from raw WHOIS text
 *
 * Registries label the same facts differently (RIPE "descr:", ARIN "OrgName:",
 * JPNIC bracketed Japanese labels...). Each field has an ordered list of
 * matchers; the first one that fully matches wins.
 */

import { AddressRange } from './address-range.js';

export const ARIN_SERVER = 'whois.arin.net';

export interface ExtractedFields {
  organizationName: string;
  addressRange?: AddressRange;
}

// Unicode-aware \W, so localized values after a label are not consumed
const NON_WORD = '[^\\p{L}\\p{M}\\p{Nd}\\p{Pc}]';
const VALUE = '(?<value>[^\\r\\n]+)';

const ORGANIZATION_MATCHERS: readonly RegExp[] = Object.freeze([
  // JPNIC: "f. [組織名]                  Example Kabushiki Kaisha"
  new RegExp(`^(?:f\\.)?${NON_WORD}*\\[組織名\\]${NON_WORD}+${VALUE}`, 'mu'),
  new RegExp(`^\\s*(?:OrgName|descr|Registrant Organization|owner):${NON_WORD}+${VALUE}`, 'mu'),
  new RegExp(`^\\s*(?:Organization|org-name):${NON_WORD}+${VALUE}`, 'mu'),
]);

const ADDRESS_RANGE_MATCHERS: readonly RegExp[] = Object.freeze([
  // JPNIC: "a. [IPネットワークアドレス]     192.0.2.0/24"
  new RegExp(`^(?:a\\.)?${NON_WORD}*\\[IPネットワークアドレス\\]${NON_WORD}+${VALUE}`, 'mu'),
  // Whitespace only after the label: IPv6 values may start with "::"
  new RegExp(`^(?:NetRange|CIDR|inet6?num):\\s+${VALUE}`, 'mu'),
]);

// ARIN summary line: "Example Org (NET-192-0-2-0-1) 192.0.2.0 - 192.0.2.255"
const ARIN_SUMMARY = /^(?<org>.*) (?<range>\d+\.\d+\.\d+\.\d+ - \d+\.\d+\.\d+\.\d+)/gm;
const ARIN_BLOCK_LABELS = new Set(['NetRange:', 'CIDR:', 'inetnum:']);

function matchValue(raw: string, matcher: RegExp): string | undefined {
  return matcher.exec(raw)?.groups?.value?.trim() || undefined;
}

export function extractOrganizationName(raw: string): string {
  for (const matcher of ORGANIZATION_MATCHERS) {
    const value = matchValue(raw, matcher);
    if (value) return value;
  }
  return '';
}

/**
 * A matched value that is not a valid range counts as a miss
 */
export function extractAddressRange(raw: string): AddressRange | undefined {
  for (const matcher of ADDRESS_RANGE_MATCHERS) {
    const value = matchValue(raw, matcher);
    const range = value ? AddressRange.tryParse(value) : undefined;
    if (range) return range;
  }
  return undefined;
}

/**
 * ARIN appends a one-line summary per network after the detailed block;
 * the last one is the most specific.
 */
export function extractArinSummary(raw: string): Required<ExtractedFields> | undefined {
  const matches = [...raw.matchAll(ARIN_SUMMARY)];
  const last = matches[matches.length - 1];
  if (!last?.groups) return undefined;

  const organizationName = last.groups.org.trim();
  if (!organizationName || ARIN_BLOCK_LABELS.has(organizationName)) return undefined;

  const addressRange = AddressRange.tryParse(last.groups.range);
  if (!addressRange) return undefined;

  return { organizationName, addressRange };
}

/**
 * Derive organization name and address range from the final response
 *
 * @param respondedServers server chain; its last element decides the ARIN override
 */
export function extractFields(raw: string, respondedServers: readonly string[]): ExtractedFields {
  const fields: ExtractedFields = {
    organizationName: extractOrganizationName(raw),
    addressRange: extractAddressRange(raw),
  };

  const lastServer = respondedServers[respondedServers.length - 1];
  if (lastServer?.toLowerCase() === ARIN_SERVER) {
    const summary = extractArinSummary(raw);
    if (summary) {
      return summary;
    }
  }

  return fields;
}
