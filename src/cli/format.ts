import colors from '../utils/colors.js';
import type { LookupResult } from '../whois/response.js';

export interface LookupReport {
  respondedServers: string[];
  organizationName: string | null;
  addressRange: { begin: string; end: string; notation: string } | null;
  raw: string;
}

export function toReport(result: LookupResult): LookupReport {
  return {
    respondedServers: [...result.respondedServers],
    organizationName: result.organizationName || null,
    addressRange: result.addressRange
      ? { ...result.addressRange.toJSON(), notation: result.addressRange.toString() }
      : null,
    raw: result.raw,
  };
}

/**
 * Human-readable report: server chain, extracted fields, then the raw text
 */
export function formatReport(query: string, result: LookupResult): string {
  const chain = result.respondedServers.map((server) => colors.cyan(server)).join(colors.gray(' → '));

  return [
    colors.bold(`WHOIS ${query}`),
    '',
    `${colors.gray('Servers:')}       ${chain}`,
    `${colors.gray('Organization:')}  ${result.organizationName || colors.gray('N/A')}`,
    `${colors.gray('Address range:')} ${result.addressRange ? colors.green(result.addressRange.toString()) : colors.gray('N/A')}`,
    '',
    result.raw.trimEnd() || colors.yellow('(empty response)'),
    '',
  ].join('\n');
}
