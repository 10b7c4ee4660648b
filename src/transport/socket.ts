/**
 * TCP transport for WHOIS (RFC 3912)
 *
 * One connection per query: write the query line terminated by CRLF, then
 * read until the server closes the stream.
 */

import { createConnection } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import type { TransportChannel, TransportRequest } from '../types/index.js';
import { AbortError, ConnectionError, TimeoutError } from '../core/errors.js';
import { decodeText, encodeQueryLine } from '../utils/charset.js';

export interface SocketTransportOptions {
  /**
   * Pause after a failed or interrupted exchange before reporting it (ms)
   * @default 200
   */
  cooldown?: number;
}

interface Received {
  data: Buffer;
  /**
   * Set when the stream failed after the connection was established
   */
  interrupted?: Error;
}

export const DEFAULT_SOCKET_OPTIONS: Required<SocketTransportOptions> = {
  cooldown: 200,
};

export class SocketTransport implements TransportChannel {
  private options: Required<SocketTransportOptions>;

  constructor(options: SocketTransportOptions = {}) {
    this.options = {
      ...DEFAULT_SOCKET_OPTIONS,
      ...options,
    };
  }

  async send(request: TransportRequest): Promise<string> {
    if (request.signal?.aborted) {
      throw new AbortError();
    }

    let received: Received;
    try {
      received = await this.exchange(request);
    } catch (error) {
      if (error instanceof AbortError) {
        throw error;
      }
      await this.coolDown(request.signal);
      if (request.rethrowErrors) {
        throw error;
      }
      return '';
    }

    // Partial data beats none: a broken stream keeps what already arrived
    if (received.interrupted) {
      await this.coolDown(request.signal);
    }
    return decodeText(received.data, request.encoding);
  }

  /**
   * Run one exchange. Rejects only for connect-phase failures and aborts.
   */
  private exchange(request: TransportRequest): Promise<Received> {
    const { host, port, query, timeout, signal } = request;

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let connected = false;
      let settled = false;
      let phase: 'write' | 'read' = 'write';

      const socket = createConnection({ host, port });

      const connectTimer = setTimeout(() => {
        fail(new TimeoutError({ phase: 'connect', timeout, host }));
      }, timeout);

      const cleanup = () => {
        clearTimeout(connectTimer);
        signal?.removeEventListener('abort', onAbort);
        socket.destroy();
      };

      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(error);
      };

      const finish = (interrupted?: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve({ data: Buffer.concat(chunks), interrupted });
      };

      const onAbort = () => fail(new AbortError());

      signal?.addEventListener('abort', onAbort, { once: true });

      socket.once('connect', () => {
        connected = true;
        clearTimeout(connectTimer);
        socket.setTimeout(timeout);
        socket.write(encodeQueryLine(`${query}\r\n`), () => {
          phase = 'read';
        });
      });

      socket.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });

      socket.on('end', () => finish());

      socket.on('timeout', () => {
        finish(new TimeoutError({ phase, timeout, host }));
      });

      socket.on('error', (error: NodeJS.ErrnoException) => {
        if (connected) {
          finish(error);
          return;
        }
        fail(new ConnectionError(
          `Could not connect to ${host}:${port}: ${error.message || error.code || 'connection failed'}`,
          { host, port, code: error.code }
        ));
      });

      socket.on('close', () => {
        if (connected) {
          finish();
          return;
        }
        fail(new ConnectionError(`Connection to ${host}:${port} closed before it was established`, { host, port }));
      });
    });
  }

  private async coolDown(signal?: AbortSignal): Promise<void> {
    if (this.options.cooldown <= 0) return;

    try {
      await sleep(this.options.cooldown, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new AbortError();
      }
      throw error;
    }
  }
}
