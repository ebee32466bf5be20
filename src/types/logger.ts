/**
 * Structured Logger Interface
 * Compatible with Pino, console, and custom loggers
 */

/**
 * Logger interface that pino loggers satisfy as-is
 *
 * @example Pino
 * ```typescript
 * import { pino } from 'pino';
 * const client = createWhois({ logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Custom logger
 * ```typescript
 * const logger = {
 *   debug: (obj, msg) => myCustomLog('DEBUG', msg, obj),
 *   info: (obj, msg) => myCustomLog('INFO', msg, obj),
 *   warn: (obj, msg) => myCustomLog('WARN', msg, obj),
 *   error: (obj, msg) => myCustomLog('ERROR', msg, obj),
 * };
 * const client = createWhois({ logger });
 * ```
 */
export interface Logger {
  /**
   * Connection and timing details
   */
  debug(obj: object, message?: string): void;

  info(obj: object, message?: string): void;

  /**
   * Recoverable problems, e.g. a truncated response
   */
  warn(obj: object, message?: string): void;

  error(obj: object, message?: string): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Console adapter
 */
export const consoleLogger: Logger = {
  debug: (obj, message) => console.debug(message ?? '', obj),
  info: (obj, message) => console.info(message ?? '', obj),
  warn: (obj, message) => console.warn(message ?? '', obj),
  error: (obj, message) => console.error(message ?? '', obj),
};

/**
 * Silent logger - no output
 * Default for library use and tests
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 999,
};

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const minLevelNum = levels[minLevel];
  const enabled = (level: Exclude<LogLevel, 'silent'>) => levels[level] >= minLevelNum;

  return {
    debug: (obj, message) => {
      if (enabled('debug')) baseLogger.debug(obj, message);
    },
    info: (obj, message) => {
      if (enabled('info')) baseLogger.info(obj, message);
    },
    warn: (obj, message) => {
      if (enabled('warn')) baseLogger.warn(obj, message);
    },
    error: (obj, message) => {
      if (enabled('error')) baseLogger.error(obj, message);
    },
  };
}
