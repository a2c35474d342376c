/**
 * Logging Module
 */

export {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  LogEntrySchema,
  type LogEntry,
  LogFormat,
  LogFormatSchema,
  LoggerConfigSchema,
  type LoggerConfig,
  createDefaultLoggerConfig,
  LogColors,
  LogLevelColors,
  parseLogLevel,
  parseLogFormat,
  getLogLevelName,
  shouldLog,
  formatError,
  loadLoggerConfigFromEnv,
} from './types.js';

export {
  Logger,
  getGlobalLogger,
  setGlobalLogger,
  resetGlobalLogger,
  createLogger,
  resolveLogger,
} from './logger.js';
