/**
 * Recursive WHOIS resolution
 *
 * Queries the bootstrap server, follows referrals hop by hop and extracts
 * the organization and address range from the last response.
 */

import type { LookupOptions, RawQueryOptions } from '../types/index.js';
import { AbortError } from '../core/errors.js';
import {
  resolveLookupOptions,
  resolveRawQueryOptions,
  type ResolvedLookupOptions,
} from '../core/options.js';
import { buildQueryStatement } from './query-statement.js';
import { detectReferral } from './referral.js';
import { createLookupResult, type LookupResult } from './response.js';

/**
 * Query one hop, retrying while the response is blank.
 *
 * Failed attempts only throw when `rethrowErrors` is set; the error of the
 * final attempt is the one that propagates. Aborts are never retried.
 */
async function fetchHop(
  query: string,
  server: string,
  port: number,
  options: ResolvedLookupOptions
): Promise<string> {
  const { transport, logger, signal, retries } = options;
  const statement = buildQueryStatement(server, query);

  let raw = '';
  let attempt = 0;

  while (!raw.trim() && attempt < retries) {
    if (signal?.aborted) {
      throw new AbortError();
    }

    attempt++;
    logger.debug({ server, port, attempt, statement }, `WHOIS query to ${server}:${port}`);

    try {
      raw = await transport.send({
        host: server,
        port,
        query: statement,
        encoding: options.encoding,
        timeout: options.timeout,
        rethrowErrors: options.rethrowErrors,
        signal,
      });
    } catch (error) {
      if (error instanceof AbortError || (options.rethrowErrors && attempt >= retries)) {
        throw error;
      }
      logger.warn(
        { server, port, attempt, retries, error: error instanceof Error ? error.message : String(error) },
        `WHOIS attempt ${attempt}/${retries} to ${server} failed`
      );
      raw = '';
    }
  }

  if (!raw.trim()) {
    logger.warn({ server, port, attempts: attempt }, `No response from ${server} after ${attempt} attempt(s)`);
  }

  return raw;
}

/**
 * Look up `query`, following referrals until a server answers without one
 *
 * There is no hop limit: two servers that refer to each other are chased
 * forever. A referral back to the server just queried ends the chain.
 *
 * @example
 * ```typescript
 * const result = await resolve('192.0.2.1');
 * console.log(result.respondedServers); // ['whois.iana.org', 'whois.arin.net']
 * console.log(result.organizationName, result.addressRange?.toString());
 * ```
 *
 * @throws {ValidationError} for invalid options
 * @throws {AbortError} when `signal` aborts
 * @throws the transport error of the last attempt, only with `rethrowErrors`
 */
export async function resolve(query: string, options: LookupOptions = {}): Promise<LookupResult> {
  const config = resolveLookupOptions(options);
  const { logger } = config;

  const servers = [config.server];
  let port = config.port;

  while (true) {
    const server = servers[servers.length - 1];
    const raw = await fetchHop(query, server, port, config);

    const referral = detectReferral(raw, server);
    if (!referral) {
      logger.debug({ query, servers }, `WHOIS lookup for ${query} answered by ${server}`);
      return createLookupResult(servers, raw);
    }

    logger.debug({ from: server, to: referral.host, port: referral.port }, `Referral ${server} -> ${referral.host}`);
    servers.push(referral.host);
    port = referral.port;
  }
}

/**
 * Send `query` to `server` as is and return the response text.
 * No query dialect, retries, referrals or field extraction.
 */
export async function rawQuery(query: string, server: string, options: RawQueryOptions = {}): Promise<string> {
  const config = resolveRawQueryOptions(server, options);

  config.logger.debug({ server: config.server, port: config.port }, `Raw WHOIS query to ${config.server}`);

  return config.transport.send({
    host: config.server,
    port: config.port,
    query,
    encoding: config.encoding,
    timeout: config.timeout,
    rethrowErrors: config.rethrowErrors,
    signal: config.signal,
  });
}
