/**
 * Feed Recorder: Logger
 *
 * Simple structured logging utility.
 * Logs are JSON-formatted in production for easy parsing.
 *
 * Components take a `Logger` so callers (and tests) can swap the sink;
 * the module-level `logger` writes to the console, and additionally to
 * LOG_FILE when that is set.
 */

import { appendFileSync } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /**
   * Create a child logger with default context.
   */
  child(defaultContext: LogContext): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  context?: LogContext;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// Get log level from environment, default to 'info'
function levelFromEnv(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    // JSON format for production
    return JSON.stringify(entry);
  }

  // Human-readable format for development
  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

export interface ConsoleSinkOptions {
  /** Also append each line to this file */
  file?: string;
}

/**
 * Console by level, plus a log file when one is given.
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): LogSink {
  let fileBroken = false;

  const writeToFile = (line: string): void => {
    if (!options.file || fileBroken) return;

    try {
      appendFileSync(options.file, `${line}\n`, 'utf8');
    } catch (error) {
      // Report once, then keep logging to the console only
      fileBroken = true;
      console.error(`Cannot write log file ${options.file}: ${error instanceof Error ? error.message : String(error)}`);
    }
  };

  return (entry) => {
    const formatted = formatEntry(entry);

    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }

    writeToFile(formatted);
  };
}

/**
 * Build a logger writing to `sink`. Without an explicit level the
 * LOG_LEVEL environment variable is read on every call.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? createConsoleSink({ file: process.env.LOG_FILE });
  const defaultContext = options.context ?? {};

  const shouldLog = (level: LogLevel): boolean =>
    LOG_LEVELS[level] >= LOG_LEVELS[options.level ?? levelFromEnv()];

  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (!shouldLog(level)) return;

    const merged = { ...defaultContext, ...context };

    sink({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(merged).length > 0 ? merged : undefined,
    });
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: (childContext) =>
      createLogger({
        level: options.level,
        sink,
        context: { ...defaultContext, ...childContext },
      }),
  };
}

/**
 * Logger interface.
 */
export const logger: Logger = createLogger();

/**
 * Performance timing utility.
 */
export function timeOperation<T>(
  name: string,
  operation: () => Promise<T>,
  log: Logger = logger
): Promise<T> {
  const start = performance.now();

  const logResult = (durationMs: number) => {
    log.debug(`${name} completed`, { durationMs: Math.round(durationMs) });
  };

  return operation()
    .then((r) => {
      logResult(performance.now() - start);
      return r;
    })
    .catch((err: unknown) => {
      logResult(performance.now() - start);
      throw err;
    });
}
