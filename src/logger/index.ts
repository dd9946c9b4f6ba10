/**
 * Logger Module
 *
 * Exports logging utilities for the proxy server.
 *
 * @module logger
 */

export {
  createLogger,
  consoleSink,
  messageSink,
  silentSink,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogRecord,
  type LogSink,
} from './event-logger.js';
