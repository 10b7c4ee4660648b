export { resolve, rawQuery } from './whois/resolver.js';
export { createLookupResult } from './whois/response.js';
export type { LookupResult } from './whois/response.js';
export { detectReferral, DEFAULT_WHOIS_PORT } from './whois/referral.js';
export type { Referral } from './whois/referral.js';
export { buildQueryStatement } from './whois/query-statement.js';
export {
  extractFields,
  extractOrganizationName,
  extractAddressRange,
  extractArinSummary,
  ARIN_SERVER,
} from './whois/extract.js';
export type { ExtractedFields } from './whois/extract.js';
export { AddressRange } from './whois/address-range.js';
export type { IPAddress } from './whois/address-range.js';

export { WhoisClient, createWhois } from './core/client.js';
export type { WhoisClientOptions } from './core/client.js';
export { DEFAULT_LOOKUP_OPTIONS, MAX_TIMEOUT, resolveLookupOptions, resolveRawQueryOptions } from './core/options.js';
export {
  WhoisError,
  TimeoutError,
  ConnectionError,
  AbortError,
  ValidationError,
  ParseError,
} from './core/errors.js';
export type { TimeoutPhase } from './core/errors.js';

export { SocketTransport, DEFAULT_SOCKET_OPTIONS } from './transport/socket.js';
export type { SocketTransportOptions } from './transport/socket.js';

export { consoleLogger, silentLogger, createLevelLogger } from './types/logger.js';
export type {
  Logger,
  LogLevel,
  TransportChannel,
  TransportRequest,
  LookupOptions,
  RawQueryOptions,
} from './types/index.js';

export { decodeText, encodeQueryLine, normalizeCharset, isCharsetSupported } from './utils/charset.js';
