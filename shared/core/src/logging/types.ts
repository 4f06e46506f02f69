/**
 * Logger Type Definitions
 *
 * ILogger decouples components from the logging library. Every component
 * takes an optional logger through its `deps` object; production code gets a
 * cached Pino logger, tests inject RecordingLogger or NullLogger.
 */

/**
 * Log level union type for type-safe level checking.
 * `silent` disables output entirely (test runs).
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some(level => level === value);
}

/**
 * Metadata object that can be attached to log entries.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Minimal logger surface for collaborators that only need the four
 * common levels (notifier adapters, health checks).
 */
export interface ServiceLogger {
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  debug: (message: string, meta?: LogMeta) => void;
}

/**
 * Core logger interface.
 *
 * @example
 * ```typescript
 * class RateLimiter {
 *   constructor(limits: RateLimits, deps: { logger?: ILogger } = {}) {
 *     this.logger = deps.logger ?? createLogger('rate-limiter');
 *   }
 * }
 *
 * // Test
 * const logger = new RecordingLogger();
 * new RateLimiter(limits, { logger });
 * expect(logger.hasLogMatching('warn', 'Unknown rate limit key')).toBe(true);
 * ```
 */
export interface ILogger extends ServiceLogger {
  fatal(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger whose bindings are merged into every entry.
   */
  child(bindings: LogMeta): ILogger;

  isLevelEnabled?(level: LogLevel): boolean;
}

/**
 * Configuration for logger creation.
 */
export interface LoggerConfig {
  /** Service/module name for log identification. */
  name: string;

  /** @default process.env.LOG_LEVEL ?? 'info' */
  level?: LogLevel;

  /** @default NODE_ENV=development and LOG_FORMAT is not json */
  pretty?: boolean;

  /** Additional context to include in every log entry. */
  bindings?: LogMeta;
}
