/**
 * Shared type barrel
 */

export type { TagValue, TagMap, EpochSeconds, Clock, JsonValue, JsonObject } from './common';
export type {
  TransportKind,
  DashboardUserConfig,
  DashboardAppConstants,
  DashboardConfig
} from './config';

/**
 * Timer scheduling abstraction used by sinks
 */
export interface TimerAPI {
  /**
   * Set a timer
   * @param intervalMs - Interval in milliseconds
   * @param repeat - Whether to repeat the timer
   * @param callback - Function to call when timer fires
   */
  set(intervalMs: number, repeat: boolean, callback: () => void): void;
}

/**
 * Fetch function signature (global fetch or a test double)
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
