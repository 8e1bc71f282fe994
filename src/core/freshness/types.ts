/**
 * Freshness tracking type definitions
 */

import type { Snapshot } from '@core/snapshot';

/**
 * Best snapshot accepted so far and its resolved instant
 *
 * Replaced as a whole on every acceptance so snapshot and instant
 * are never observed out of step.
 */
export interface TrackedState {
  /** Most recent accepted snapshot, null before the first acceptance */
  readonly snapshot: Snapshot | null;

  /** Resolved instant of snapshot; -Infinity before the first acceptance */
  readonly instant: number;
}

/**
 * Session-owned holder of the tracked state
 */
export interface FreshnessTracker {
  /** Offer a snapshot; returns true when it became the tracked one */
  consider(snapshot: Snapshot): boolean;
  /** Current tracked state */
  current(): TrackedState;
  /** Whether any snapshot has been accepted */
  hasSnapshot(): boolean;
}
