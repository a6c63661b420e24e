/**
 * Universal Logger Interface
 * Compatible with Pino, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const store = new DocumentStore({ config, logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const store = new DocumentStore({ config, logger: consoleLogger });
 * ```
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => console.debug(msgOrObj, ...args),
  info: (msgOrObj: string | object, ...args: unknown[]) => console.info(msgOrObj, ...args),
  warn: (msgOrObj: string | object, ...args: unknown[]) => console.warn(msgOrObj, ...args),
  error: (msgOrObj: string | object, ...args: unknown[]) => console.error(msgOrObj, ...args),
};

/**
 * Silent logger - no output. Default for stores created without a logger.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

type LogMethod = Logger['debug'];

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const minLevelNum = levels[minLevel];
  const methods: Record<LogLevel, LogMethod> = {
    debug: baseLogger.debug.bind(baseLogger),
    info: baseLogger.info.bind(baseLogger),
    warn: baseLogger.warn.bind(baseLogger),
    error: baseLogger.error.bind(baseLogger),
  };

  const at = (level: LogLevel) =>
    (msgOrObj: string | object, message?: string, ...args: unknown[]) => {
      if (levels[level] < minLevelNum) return;
      const method = methods[level];
      if (typeof msgOrObj === 'string') {
        method(msgOrObj, ...(message === undefined ? args : [message, ...args]));
      } else {
        method(msgOrObj, message, ...args);
      }
    };

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
  };
}
