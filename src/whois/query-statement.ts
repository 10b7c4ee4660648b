/**
 * Query dialects of WHOIS servers that do not take a bare search term
 */
const QUERY_TEMPLATES: Record<string, (query: string) => string> = {
  'whois.internic.net': (query) => `domain ${query}`,
  'whois.verisign-grs.com': (query) => `domain ${query}`,
  // Without "n +" ARIN answers "Query terms are ambiguous" for handles and networks
  'whois.arin.net': (query) => `n + ${query}`,
};

/**
 * Build the exact line sent to `server` for `query` (without CRLF)
 *
 * @example
 * buildQueryStatement('whois.verisign-grs.com', 'example.com') // 'domain example.com'
 * buildQueryStatement('whois.arin.net', '192.0.2.1') // 'n + 192.0.2.1'
 * buildQueryStatement('whois.ripe.net', '192.0.2.1') // '192.0.2.1'
 */
export function buildQueryStatement(server: string, query: string): string {
  const template = QUERY_TEMPLATES[server.toLowerCase()];
  return template ? template(query) : query;
}
