/**
 * @module
 * Logging contract shared by the executors in this package. Compatible with
 * `console`, pino, winston and most other logging libraries.
 */

/**
 * Logger interface for executor lifecycle logging.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A no-op logger that discards all log messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Returns a logger that prefixes every message with `[name]`.
 *
 * @example
 * ```typescript
 * const log = scopedLogger(console, 'WorkerPool:io');
 * log.debug('lane 0 started'); // -> "[WorkerPool:io] lane 0 started"
 * ```
 */
export function scopedLogger(logger: Logger, name: string): Logger {
  if (logger === noopLogger) return noopLogger;
  const prefix = `[${name}]`;
  return {
    debug: (message, ...args) => logger.debug(`${prefix} ${message}`, ...args),
    info: (message, ...args) => logger.info(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => logger.warn(`${prefix} ${message}`, ...args),
    error: (message, ...args) => logger.error(`${prefix} ${message}`, ...args),
  };
}
