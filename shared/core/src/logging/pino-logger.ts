/**
 * Pino Logger Implementation
 *
 * - Named loggers are cached, so `createPinoLogger('failover-manager')`
 *   returns the same instance everywhere
 * - JSON output by default, pino-pretty when NODE_ENV=development
 * - Exchange credentials are redacted from every entry
 */

import pino, { Logger as PinoLoggerType, LoggerOptions } from 'pino';
import { isLogLevel } from './types';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

// =============================================================================
// Singleton Cache
// =============================================================================

const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers.
 * Used for testing and service shutdown.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

// =============================================================================
// Options
// =============================================================================

/**
 * Fields that may carry exchange credentials or operator tokens.
 */
export const REDACTED_PATHS: readonly string[] = [
  'apiKey', '*.apiKey',
  'apiSecret', '*.apiSecret',
  'secret', '*.secret',
  'token', '*.token',
  'authToken', '*.authToken',
  'password', '*.password',
  'authorization', '*.authorization',
  'headers.authorization',
];

const serializers: LoggerOptions['serializers'] = {
  err: pino.stdSerializers.err,
  error: pino.stdSerializers.err,
};

function resolveLevel(level: LogLevel | undefined): LogLevel {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Build the Pino options for a named logger. Exported for tests.
 */
export function buildPinoOptions(config: LoggerConfig): LoggerOptions {
  // LOG_FORMAT=json forces JSON output even in development
  const usePretty = config.pretty
    ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name: config.name,
    level: resolveLevel(config.level),
    serializers,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    base: {
      service: config.name,
      pid: process.pid,
    },
    redact: {
      paths: [...REDACTED_PATHS],
      censor: '[REDACTED]',
    },
  };

  if (usePretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
  }

  return options;
}

// =============================================================================
// Pino Logger Wrapper
// =============================================================================

/**
 * Adapts Pino's `(meta, msg)` argument order to ILogger's `(msg, meta)`.
 */
export class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.fatal(meta, msg);
    else this.pino.fatal(msg);
  }

  error(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.error(meta, msg);
    else this.pino.error(msg);
  }

  warn(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.warn(meta, msg);
    else this.pino.warn(msg);
  }

  info(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.info(meta, msg);
    else this.pino.info(msg);
  }

  debug(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.debug(meta, msg);
    else this.pino.debug(msg);
  }

  trace(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.trace(meta, msg);
    else this.pino.trace(msg);
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== 'silent' && this.pino.isLevelEnabled(level);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create (or fetch the cached) Pino logger.
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger('rate-limiter');
 * const verbose = createPinoLogger({ name: 'guarded-client', level: 'debug' });
 * ```
 */
export function createPinoLogger(config: string | LoggerConfig): ILogger {
  const normalized: LoggerConfig = typeof config === 'string' ? { name: config } : config;

  let logger = loggerCache.get(normalized.name);
  if (!logger) {
    logger = new PinoLoggerWrapper(pino(buildPinoOptions(normalized)));
    loggerCache.set(normalized.name, logger);
  }

  // Children are not cached
  return normalized.bindings ? logger.child(normalized.bindings) : logger;
}

/**
 * Alias of createPinoLogger for DI call sites.
 */
export function getLogger(name: string): ILogger {
  return createPinoLogger(name);
}
