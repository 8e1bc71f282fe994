/**
 * Console output sink with buffered draining
 *
 * Keeps log output from interleaving with the live dashboard view by:
 * - Buffering messages up to a configurable limit
 * - Draining the buffer at fixed intervals
 * - Dropping messages with warning when buffer overflows
 */

import type { TimerAPI } from '$types';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI } from '../types';

/**
 * Create a console sink with buffering
 *
 * @param timerApi - Timer API for scheduling drain
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (bufferSize, drainInterval)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(createNodeTimer(), console, {
 *   bufferSize: 50,
 *   drainInterval: 250
 * });
 * consoleSink.initialize(function(ok, msg) {});
 * consoleSink.write('Dashboard started');
 * ```
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): ConsoleSink {
  const buffer: string[] = [];
  let drainStarted = false;

  /**
   * Write every buffered message in FIFO order
   */
  function flush(): void {
    const pending = buffer.splice(0, buffer.length);
    for (let i = 0; i < pending.length; i++) {
      consoleApi.log(pending[i]);
    }
  }

  /**
   * Start the drain timer (idempotent)
   */
  function startDrain() {
    if (!drainStarted) {
      drainStarted = true;
      timerApi.set(config.drainInterval, true, flush);
    }
  }

  /**
   * Write formatted message to buffer
   * @param formattedMessage - Pre-formatted log message
   */
  function write(formattedMessage: string) {
    if (buffer.length < config.bufferSize) {
      buffer.push(formattedMessage);
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  /**
   * Initialize the sink by starting the drain timer
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    startDrain();
    callback(true, 'Console sink initialized');
  }

  return {
    write: write,
    initialize: initialize,
    getBufferSize: getBufferSize,
    flush: flush
  };
}
