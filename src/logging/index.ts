/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with buffering (createConsoleSink)
 * - File sink with timestamped lines (createFileSink)
 * - Slack sink with webhook retry (createSlackSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, parseLogLevel, logLevelName, LOG_LEVEL_NAMES } from './helpers';
export { createConsoleSink } from './console';
export { createFileSink, openAppendStream, formatLinePrefix } from './file';
export { createSlackSink, resolveWebhookUrl } from './slack';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FileSink,
  FileSinkConfig,
  FileSinkDependencies,
  LineStream,
  SlackSink,
  SlackSinkConfig,
  FilterContext,
  InitMessage
} from './types';
