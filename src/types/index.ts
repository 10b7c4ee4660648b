import type { Logger } from './logger.js';

export type { Logger, LogLevel } from './logger.js';

/**
 * One exchange with a WHOIS server
 */
export interface TransportRequest {
  host: string;
  port: number;
  /**
   * Query line, without the trailing CRLF
   */
  query: string;
  /**
   * Charset used to decode the response
   */
  encoding: string;
  /**
   * Connect timeout, and idle timeout for every read/write (ms)
   */
  timeout: number;
  /**
   * Throw connect-phase failures instead of returning an empty response
   */
  rethrowErrors: boolean;
  signal?: AbortSignal;
}

/**
 * Carries a single query/response exchange over the network.
 *
 * Implementations resolve with the decoded response text. A connect-phase
 * failure either rejects (when `rethrowErrors` is set) or resolves with an
 * empty string; a failure while reading resolves with whatever arrived.
 * An aborted signal always rejects with `AbortError`.
 */
export interface TransportChannel {
  send(request: TransportRequest): Promise<string>;
}

export interface RawQueryOptions {
  /**
   * TCP port of the WHOIS server
   * @default 43
   */
  port?: number;

  /**
   * Charset used to decode the response
   * @default 'ascii'
   */
  encoding?: string;

  /**
   * Connect timeout, and idle timeout for every read/write, in milliseconds
   * @default 600000
   */
  timeout?: number;

  /**
   * Propagate transport errors instead of degrading to an empty response
   * @default false
   */
  rethrowErrors?: boolean;

  /**
   * Cancels the in-flight exchange; the call then rejects with AbortError
   */
  signal?: AbortSignal;

  /**
   * Channel used for the exchange
   * @default new SocketTransport()
   */
  transport?: TransportChannel;

  /**
   * @default silentLogger
   */
  logger?: Logger;
}

export interface LookupOptions extends RawQueryOptions {
  /**
   * Bootstrap WHOIS server, the first element of the server chain
   * @default 'whois.iana.org'
   */
  server?: string;

  /**
   * Attempts per hop before giving up on that hop
   * @default 10
   */
  retries?: number;
}
