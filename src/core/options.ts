import { z } from 'zod';
import type { LookupOptions, RawQueryOptions, TransportChannel } from '../types/index.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { SocketTransport } from '../transport/socket.js';
import { isCharsetSupported } from '../utils/charset.js';
import { ValidationError } from './errors.js';

export const DEFAULT_LOOKUP_OPTIONS = {
  server: 'whois.iana.org',
  port: 43,
  encoding: 'ascii',
  timeout: 600_000,
  retries: 10,
  rethrowErrors: false,
} as const;

// Largest delay Node timers hold; longer ones fire after 1ms
export const MAX_TIMEOUT = 2_147_483_647;

const rawQuerySchema = z.object({
  server: z.string().trim().min(1, 'server must not be empty'),
  port: z.number().int().min(1).max(65535),
  encoding: z.string().trim().min(1, 'encoding must not be empty')
    .refine(isCharsetSupported, (value) => ({ message: `unsupported charset "${value}"` })),
  timeout: z.number().positive().max(MAX_TIMEOUT, `timeout must not exceed ${MAX_TIMEOUT}ms`),
  rethrowErrors: z.boolean(),
});

const lookupSchema = rawQuerySchema.extend({
  retries: z.number().int().min(0),
});

interface RuntimeOptions {
  signal?: AbortSignal;
  transport: TransportChannel;
  logger: Logger;
}

export type ResolvedRawQueryOptions = z.infer<typeof rawQuerySchema> & RuntimeOptions;
export type ResolvedLookupOptions = z.infer<typeof lookupSchema> & RuntimeOptions;

function validate<T extends z.ZodTypeAny>(schema: T, input: Record<string, unknown>): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const field = issue.path.map(String).join('.');
  throw new ValidationError(`Invalid option "${field}": ${issue.message}`, {
    field,
    value: input[field],
  });
}

function runtimeOptions(options: RawQueryOptions): RuntimeOptions {
  return {
    signal: options.signal,
    transport: options.transport ?? new SocketTransport(),
    logger: options.logger ?? silentLogger,
  };
}

/**
 * Merge caller options with the defaults and validate them
 *
 * @throws {ValidationError} when an option is out of range
 */
export function resolveLookupOptions(options: LookupOptions = {}): ResolvedLookupOptions {
  const values = validate(lookupSchema, {
    server: options.server || DEFAULT_LOOKUP_OPTIONS.server,
    port: options.port ?? DEFAULT_LOOKUP_OPTIONS.port,
    encoding: options.encoding ?? DEFAULT_LOOKUP_OPTIONS.encoding,
    timeout: options.timeout ?? DEFAULT_LOOKUP_OPTIONS.timeout,
    retries: options.retries ?? DEFAULT_LOOKUP_OPTIONS.retries,
    rethrowErrors: options.rethrowErrors ?? DEFAULT_LOOKUP_OPTIONS.rethrowErrors,
  });
  return { ...values, ...runtimeOptions(options) };
}

export function resolveRawQueryOptions(server: string, options: RawQueryOptions = {}): ResolvedRawQueryOptions {
  const values = validate(rawQuerySchema, {
    server,
    port: options.port ?? DEFAULT_LOOKUP_OPTIONS.port,
    encoding: options.encoding ?? DEFAULT_LOOKUP_OPTIONS.encoding,
    timeout: options.timeout ?? DEFAULT_LOOKUP_OPTIONS.timeout,
    rethrowErrors: options.rethrowErrors ?? DEFAULT_LOOKUP_OPTIONS.rethrowErrors,
  });
  return { ...values, ...runtimeOptions(options) };
}
