/**
 * Logger interface for observability
 *
 * This interface is intentionally framework-agnostic so the resolver can be
 * handed winston, pino or a test double.
 *
 * Example usage:
 * ```typescript
 * import winston from 'winston';
 *
 * const logger = winston.createLogger({
 *   level: 'debug',
 *   transports: [new winston.transports.Console()]
 * });
 *
 * resolveServices({ catalog, services, logger });
 * ```
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(meta: Record<string, unknown>): Logger;
}

/**
 * Logger that discards everything; the default when none is injected
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
