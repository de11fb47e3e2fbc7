/**
 * Feed Recorder
 *
 * Records RSS/Atom feed entries into a deduplicated JSON or CSV file.
 */

export * from './types';
export * from './feeds';
export * from './store';
export {
  normalizeEntryDate,
  parseRfc2822Date,
  parseLooseDate,
  formatIsoTimestamp,
  type DateNormalizerOptions,
} from './lib/dates';
export {
  logger,
  createLogger,
  createConsoleSink,
  timeOperation,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LogContext,
} from './lib/logger';
export {
  loadEnvironmentConfig,
  loadFeedConfig,
  expandHome,
  DEFAULT_CONFIG_PATH,
  DEFAULT_OUTPUT_PATH,
  type EnvironmentConfig,
  type FeedConfig,
} from './config';
export { runRecorder, type RecorderOptions, type RunResult, type RunStatus } from './recorder';
