/**
 * CLI Logger Module
 *
 * Winston-based logging for the CLI. Everything goes to stderr so that
 * command output on stdout stays machine-readable.
 */

import winston from 'winston';
import type { Logger } from '@svcplan/core';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level: LogLevel;
  format: 'json' | 'simple';
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Get logger configuration
 *
 * Priority:
 * 1. Provided logLevel parameter (from --verbose)
 * 2. LOG_LEVEL environment variable
 * 3. Default: 'warn'
 *
 * Environment variables:
 * - LOG_LEVEL: error | warn | info | debug
 * - LOG_FORMAT: json | simple (default: simple)
 * - NODE_ENV: test forces 'error'
 */
export function getLoggerConfig(
  logLevel?: LogLevel,
  env: Record<string, string | undefined> = process.env
): LoggerConfig {
  const format = env.LOG_FORMAT === 'json' ? 'json' : 'simple';

  // In test mode, only log errors
  if (env.NODE_ENV === 'test') {
    return { level: 'error', format };
  }

  const level = logLevel ?? (isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'warn');
  return { level, format };
}

/**
 * Create Winston format based on configuration
 */
function createFormat(config: LoggerConfig): winston.Logform.Format {
  if (config.format === 'json') {
    return winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );
  }

  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
    })
  );
}

/**
 * Global Winston logger instance
 */
let loggerInstance: winston.Logger | null = null;

/**
 * Initialize the global logger
 * Called once per command run, before the handler
 */
export function initializeLogger(logLevel?: LogLevel): winston.Logger {
  const config = getLoggerConfig(logLevel);

  loggerInstance = winston.createLogger({
    level: config.level,
    format: createFormat(config),
    transports: [
      new winston.transports.Console({
        level: config.level,
        stderrLevels: [...LOG_LEVELS],
      }),
    ],
    exitOnError: false,
  });

  loggerInstance.debug('Logger initialized', { level: config.level, format: config.format });

  return loggerInstance;
}

/**
 * Get the global logger instance
 * Throws if logger hasn't been initialized
 */
export function getLogger(): winston.Logger {
  if (!loggerInstance) {
    throw new Error('Logger not initialized. Call initializeLogger() first.');
  }
  return loggerInstance;
}

/**
 * Create a logger for a specific component
 *
 * @example
 * ```typescript
 * const logger = createComponentLogger('check');
 * logger.debug('Loaded config', { services: 4 });
 * ```
 */
export function createComponentLogger(component: string): winston.Logger {
  return getLogger().child({ component });
}

/**
 * Adapt a Winston logger to the engine's Logger interface
 */
export function toEngineLogger(logger: winston.Logger): Logger {
  return {
    debug: (message, meta) => { logger.debug(message, meta ?? {}); },
    info: (message, meta) => { logger.info(message, meta ?? {}); },
    warn: (message, meta) => { logger.warn(message, meta ?? {}); },
    error: (message, meta) => { logger.error(message, meta ?? {}); },
    child: meta => toEngineLogger(logger.child(meta)),
  };
}
