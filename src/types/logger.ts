/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const result = await resolve('example.com', { logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const whois = createWhois({ logger: console });
 * ```
 *
 * @example Custom logger
 * ```typescript
 * const logger = {
 *   debug: (msg) => myCustomLog('DEBUG', msg),
 *   info: (msg) => myCustomLog('INFO', msg),
 *   warn: (msg) => myCustomLog('WARN', msg),
 *   error: (msg) => myCustomLog('ERROR', msg),
 * };
 * ```
 */
export interface Logger {
  /**
   * Detailed diagnostic information (hops, referrals)
   */
  debug(msgOrObj: string | object, ...args: unknown[]): void;

  info(msgOrObj: string | object, ...args: unknown[]): void;

  /**
   * Recoverable problems such as a failed attempt that will be retried
   */
  warn(msgOrObj: string | object, ...args: unknown[]): void;

  error(msgOrObj: string | object, ...args: unknown[]): void;
}

export type LogLevel = keyof Logger;

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj, ...args) => console.debug(msgOrObj, ...args),
  info: (msgOrObj, ...args) => console.info(msgOrObj, ...args),
  warn: (msgOrObj, ...args) => console.warn(msgOrObj, ...args),
  error: (msgOrObj, ...args) => console.error(msgOrObj, ...args),
};

/**
 * Silent logger - no output
 * Default for library calls, and useful in tests
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const minLevelNum = LEVELS[minLevel];

  const gate = (level: LogLevel): Logger[LogLevel] => {
    if (LEVELS[level] < minLevelNum) {
      return () => {};
    }
    return (msgOrObj, ...args) => baseLogger[level](msgOrObj, ...args);
  };

  return {
    debug: gate('debug'),
    info: gate('info'),
    warn: gate('warn'),
    error: gate('error'),
  };
}
