import { describe, it, expect } from 'vitest';
import {
  DEFAULT_LOOKUP_OPTIONS,
  MAX_TIMEOUT,
  resolveLookupOptions,
  resolveRawQueryOptions,
} from '../../src/core/options.js';
import { ValidationError } from '../../src/core/errors.js';
import { SocketTransport } from '../../src/transport/socket.js';
import { silentLogger } from '../../src/types/logger.js';
import type { LookupOptions } from '../../src/types/index.js';
import { FakeTransport } from '../helpers/fake-transport.js';

describe('resolveLookupOptions', () => {
  it('should apply the defaults', () => {
    const options = resolveLookupOptions();

    expect(options).toMatchObject(DEFAULT_LOOKUP_OPTIONS);
    expect(options.transport).toBeInstanceOf(SocketTransport);
    expect(options.logger).toBe(silentLogger);
    expect(options.signal).toBeUndefined();
  });

  it('should keep caller values', () => {
    const transport = new FakeTransport();
    const controller = new AbortController();

    const options = resolveLookupOptions({
      server: 'whois.ripe.net',
      port: 4343,
      encoding: 'utf-8',
      timeout: 1000,
      retries: 0,
      rethrowErrors: true,
      transport,
      signal: controller.signal,
    });

    expect(options).toMatchObject({
      server: 'whois.ripe.net',
      port: 4343,
      encoding: 'utf-8',
      timeout: 1000,
      retries: 0,
      rethrowErrors: true,
    });
    expect(options.transport).toBe(transport);
    expect(options.signal).toBe(controller.signal);
  });

  it('should treat an empty server as the default and trim others', () => {
    expect(resolveLookupOptions({ server: '' }).server).toBe('whois.iana.org');
    expect(resolveLookupOptions({ server: '  whois.ripe.net ' }).server).toBe('whois.ripe.net');
  });

  it.each<[string, LookupOptions]>([
    ['port', { port: 0 }],
    ['port', { port: 65536 }],
    ['port', { port: 43.5 }],
    ['timeout', { timeout: -1 }],
    ['retries', { retries: 1.5 }],
    ['encoding', { encoding: ' ' }],
    ['encoding', { encoding: 'shft_jis' }],
    ['timeout', { timeout: 2 ** 31 }],
    ['timeout', { timeout: Infinity }],
  ])('should reject an invalid %s', (field, input) => {
    let caught: unknown;
    try {
      resolveLookupOptions(input);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      field,
      message: expect.stringMatching(new RegExp(`^Invalid option "${field}": `)),
    });
  });

  it('should accept the largest timer delay and a known charset', () => {
    const options = resolveLookupOptions({ timeout: MAX_TIMEOUT, encoding: 'UTF-8' });

    expect(options.timeout).toBe(2_147_483_647);
    expect(options.encoding).toBe('UTF-8');
  });
});

describe('resolveRawQueryOptions', () => {
  it('should validate the explicit server', () => {
    expect(resolveRawQueryOptions('whois.verisign-grs.com').server).toBe('whois.verisign-grs.com');
    expect(() => resolveRawQueryOptions('')).toThrow(ValidationError);
  });

  it('should not carry retries', () => {
    expect('retries' in resolveRawQueryOptions('whois.iana.org')).toBe(false);
  });
});
