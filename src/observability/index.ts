/**
 * Observability module exports
 */

export {
  createLogger,
  configureLogging,
  resetLogging,
  getLogConfig,
  parseLogLevel,
  type Logger,
  type LogLevel,
  type EntryLevel,
  type LogSink,
  type LogConfig,
} from './logger.js';
