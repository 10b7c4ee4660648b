import type { LookupOptions, RawQueryOptions, TransportChannel } from '../types/index.js';
import { consoleLogger, silentLogger, type Logger } from '../types/logger.js';
import { SocketTransport } from '../transport/socket.js';
import { rawQuery, resolve } from '../whois/resolver.js';
import type { LookupResult } from '../whois/response.js';
import type { AddressRange } from '../whois/address-range.js';
import { DEFAULT_LOOKUP_OPTIONS } from './options.js';

/**
 * WHOIS Client options
 */
export interface WhoisClientOptions {
  /**
   * Bootstrap WHOIS server
   * @default 'whois.iana.org'
   */
  server?: string;

  /**
   * @default 43
   */
  port?: number;

  /**
   * @default 'ascii'
   */
  encoding?: string;

  /**
   * Connect and per-read/write timeout in milliseconds
   * @default 600000
   */
  timeout?: number;

  /**
   * Attempts per hop
   * @default 10
   */
  retries?: number;

  /**
   * @default false
   */
  rethrowErrors?: boolean;

  /**
   * @default new SocketTransport()
   */
  transport?: TransportChannel;

  /**
   * Takes precedence over `debug`
   */
  logger?: Logger;

  /**
   * Log hops and referrals to the console
   * @default false
   */
  debug?: boolean;
}

/**
 * WHOIS Client class
 *
 * Holds default options for repeated lookups. Each lookup is independent:
 * nothing is cached or shared between calls besides the transport.
 *
 * @example
 * ```typescript
 * const whoisClient = createWhois({ timeout: 15000, debug: true });
 *
 * const result = await whoisClient.lookup('192.0.2.1');
 * console.log(result.respondedServers, result.organizationName);
 *
 * const text = await whoisClient.raw('example.com', 'whois.verisign-grs.com');
 * ```
 */
export class WhoisClient {
  private options: Required<Omit<WhoisClientOptions, 'logger' | 'debug'>>;
  private logger: Logger;

  constructor(options: WhoisClientOptions = {}) {
    this.options = {
      server: options.server ?? DEFAULT_LOOKUP_OPTIONS.server,
      port: options.port ?? DEFAULT_LOOKUP_OPTIONS.port,
      encoding: options.encoding ?? DEFAULT_LOOKUP_OPTIONS.encoding,
      timeout: options.timeout ?? DEFAULT_LOOKUP_OPTIONS.timeout,
      retries: options.retries ?? DEFAULT_LOOKUP_OPTIONS.retries,
      rethrowErrors: options.rethrowErrors ?? DEFAULT_LOOKUP_OPTIONS.rethrowErrors,
      transport: options.transport ?? new SocketTransport(),
    };
    this.logger = options.logger ?? (options.debug ? consoleLogger : silentLogger);
  }

  /**
   * Resolve `query`, following referrals from the configured bootstrap server
   */
  async lookup(query: string, options?: LookupOptions): Promise<LookupResult> {
    const start = Date.now();

    const result = await resolve(query, {
      ...this.options,
      logger: this.logger,
      ...options,
    });

    const duration = Date.now() - start;
    const server = result.respondedServers[result.respondedServers.length - 1];
    this.logger.info(
      { query, servers: result.respondedServers, duration },
      `Lookup completed in ${duration}ms from ${server}`
    );
    return result;
  }

  /**
   * Single query without referral chasing; defaults to the bootstrap server
   */
  async raw(query: string, server?: string, options?: RawQueryOptions): Promise<string> {
    return rawQuery(query, server ?? this.options.server, {
      port: this.options.port,
      encoding: this.options.encoding,
      timeout: this.options.timeout,
      rethrowErrors: this.options.rethrowErrors,
      transport: this.options.transport,
      logger: this.logger,
      ...options,
    });
  }

  /**
   * Organization holding `query`, or null when the registry names none
   */
  async getOrganization(query: string): Promise<string | null> {
    const result = await this.lookup(query);
    return result.organizationName || null;
  }

  async getAddressRange(query: string): Promise<AddressRange | null> {
    const result = await this.lookup(query);
    return result.addressRange ?? null;
  }
}

/**
 * Create a WHOIS client
 *
 * @example
 * ```typescript
 * import { createWhois } from 'whois-chase';
 *
 * const whois = createWhois({ retries: 3 });
 * const result = await whois.lookup('example.com');
 * ```
 */
export function createWhois(options?: WhoisClientOptions): WhoisClient {
  return new WhoisClient(options);
}
