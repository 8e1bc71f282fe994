/**
 * File output sink
 *
 * Appends one line per message, prefixed with a UTC timestamp, to a log
 * file. Writes before initialization and after close are discarded.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FileSink, FileSinkConfig, FileSinkDependencies, LineStream } from '../types';

/**
 * Open an append stream, creating parent directories first
 * @param filePath - Log file path
 * @returns Stream appending to the file
 */
export function openAppendStream(filePath: string): LineStream {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  stream.on('error', function(err: Error) {
    console.warn('File sink error: ' + err.message);
  });
  return stream;
}

/**
 * Format a line prefix from a time in seconds
 * @param seconds - Unix time in seconds
 * @returns ISO-8601 instant with millisecond precision
 */
export function formatLinePrefix(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

/**
 * Create a file sink
 *
 * @param config - File sink configuration (path)
 * @param dependencies - Stream opener and time source
 * @returns File sink instance
 *
 * @example
 * ```typescript
 * const fileSink = createFileSink(
 *   { path: 'logs/dashboard.log' },
 *   { openStream: openAppendStream, timeSource: now }
 * );
 * ```
 */
export function createFileSink(config: FileSinkConfig, dependencies: FileSinkDependencies): FileSink {
  let stream: LineStream | null = null;

  function initialize(callback: (success: boolean, message: string) => void): void {
    if (stream) {
      callback(true, 'File sink writing to ' + config.path);
      return;
    }
    try {
      stream = dependencies.openStream(config.path);
      callback(true, 'File sink writing to ' + config.path);
    } catch (err) {
      callback(false, 'File sink could not open ' + config.path + ': ' + String(err));
    }
  }

  /**
   * Append a formatted message as one line
   * @param formattedMessage - Pre-formatted log message
   */
  function write(formattedMessage: string): void {
    if (!stream) return;
    stream.write(formatLinePrefix(dependencies.timeSource()) + ' ' + formattedMessage + '\n');
  }

  function close(): void {
    if (!stream) return;
    stream.end();
    stream = null;
  }

  return {
    write: write,
    initialize: initialize,
    close: close
  };
}
