/**
 * Logging Module
 *
 * Production: createLogger() / getLogger() return cached Pino loggers.
 * Tests: RecordingLogger captures entries, NullLogger discards them.
 */

export type { ILogger, LoggerConfig, LogLevel, LogMeta, ServiceLogger } from './types';
export { LOG_LEVELS, isLogLevel } from './types';

export {
  buildPinoOptions,
  createPinoLogger,
  createPinoLogger as createLogger,
  getLogger,
  PinoLoggerWrapper,
  REDACTED_PATHS,
  resetLoggerCache,
} from './pino-logger';

export { RecordingLogger, NullLogger } from './testing-logger';
export type { LogEntry } from './testing-logger';
