/**
 * Event Logger
 *
 * The proxy core never prints directly. It emits structured log records to
 * a sink; the default sink writes to the console, and a control surface can
 * subscribe its own sink (for example a plain `onLog(message)` callback).
 *
 * @module logger/event-logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A single log-worthy event
 */
export interface LogRecord {
  level: LogLevel;
  message: string;
  /** Epoch milliseconds */
  timestamp: number;
  /** Structured details (client address, target, timings...) */
  data?: Record<string, unknown>;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  sink?: LogSink;
  /** Records below this level are dropped */
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Default sink: console output, errors and warnings on stderr
 */
export const consoleSink: LogSink = (record) => {
  switch (record.level) {
    case 'error':
      console.error(record.message);
      break;
    case 'warn':
      console.warn(record.message);
      break;
    default:
      console.log(record.message);
  }
};

/**
 * Adapt a message-only callback into a sink
 */
export function messageSink(onLog: (message: string) => void): LogSink {
  return (record) => onLog(record.message);
}

/**
 * Sink that drops everything
 */
export const silentSink: LogSink = () => {};

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const threshold = LEVEL_ORDER[options.level ?? 'info'];

  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const record: LogRecord = { level, message, timestamp: Date.now() };
    if (data) {
      record.data = data;
    }
    sink(record);
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}
