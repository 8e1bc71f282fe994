/**
 * Time utility functions
 */

import type { TimerAPI } from '$types';

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch, with millisecond fraction
 */
export function now(): number {
  return Date.now() / 1000;
}

/**
 * Timer API backed by Node timers
 *
 * Timers are unref'd so a pending drain or retry never keeps the
 * process alive on its own.
 *
 * @returns Timer API for sinks that schedule their own work
 */
export function createNodeTimer(): TimerAPI {
  return {
    set: function(intervalMs: number, repeat: boolean, callback: () => void): void {
      const handle = repeat ? setInterval(callback, intervalMs) : setTimeout(callback, intervalMs);
      handle.unref();
    }
  };
}
