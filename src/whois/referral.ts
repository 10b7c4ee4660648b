/**
 * Referral detection
 *
 * Registries point at a more authoritative server in a handful of ways.
 * The matchers below are tried in order over the whole response and the first
 * one that matches anywhere decides; their order is part of the behaviour.
 */

export const DEFAULT_WHOIS_PORT = 43;

export interface Referral {
  host: string;
  port: number;
}

interface ReferralMatcher {
  name: string;
  pattern: RegExp;
}

const HOST = '(?<host>[^:\\s]+)';
const PORT = '(?::(?<port>\\d+))?';
// Non-word run, Unicode-aware
const SEP = '[^\\p{L}\\p{M}\\p{Nd}\\p{Pc}]+';

const REFERRAL_MATCHERS: readonly ReferralMatcher[] = Object.freeze([
  // ARIN: "ReferralServer:  whois://whois.ripe.net"
  { name: 'referral-server', pattern: new RegExp(`^ReferralServer:${SEP}whois://${HOST}${PORT}`, 'imu') },
  // gTLD registries: "Registrar WHOIS Server: whois.markmonitor.com"
  { name: 'whois-server', pattern: new RegExp(`^[ \\t]*(?:Registrar\\s+)?Whois Server:[ \\t]*${HOST}${PORT}`, 'imu') },
  // IANA: "refer:        whois.verisign-grs.com"
  { name: 'refer', pattern: new RegExp(`^[ \\t]*refer:[ \\t]*${HOST}${PORT}`, 'imu') },
  // IANA TLD records: "whois:        whois.nic.example"
  { name: 'whois', pattern: new RegExp(`^[ \\t]*whois:[ \\t]*${HOST}${PORT}`, 'imu') },
  // APNIC: "remarks:  ... at whois.nic.ad.jp. To obtain an English output"
  { name: 'remarks', pattern: new RegExp(`^remarks:${SEP}.*(?<host>whois\\.[0-9a-z\\-.]+\\.[a-z]{2,})${PORT}`, 'imu') },
]);

/**
 * Find the server the response refers to
 *
 * Returns undefined when no matcher fires, or when the winning match names
 * `currentServer` itself (compared case-insensitively).
 *
 * @example
 * detectReferral('refer: whois.verisign-grs.com', 'whois.iana.org')
 * // { host: 'whois.verisign-grs.com', port: 43 }
 */
export function detectReferral(raw: string, currentServer: string): Referral | undefined {
  for (const matcher of REFERRAL_MATCHERS) {
    const groups = matcher.pattern.exec(raw)?.groups;
    if (!groups?.host) continue;

    if (groups.host.toLowerCase() === currentServer.toLowerCase()) {
      return undefined;
    }

    return {
      host: groups.host,
      port: groups.port ? Number.parseInt(groups.port, 10) : DEFAULT_WHOIS_PORT,
    };
  }

  return undefined;
}
