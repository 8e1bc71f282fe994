/**
 * Freshness tracking
 *
 * Retains the most recent snapshot across polls. Re-fetching a cached or
 * eventually-consistent source can return a payload older than one already
 * seen; the monotonic rule keeps the displayed state from moving backwards.
 */

import type { Snapshot } from '@core/snapshot';
import type { FreshnessTracker, TrackedState } from './types';

/**
 * Initial state: nothing accepted, lowest possible instant
 * @returns Empty tracked state
 */
export function createInitialTrackedState(): TrackedState {
  return { snapshot: null, instant: -Infinity };
}

/**
 * Decide whether a snapshot should replace the tracked one
 *
 * Snapshots without a resolved instant are never accepted. Equal instants
 * are accepted: the later fetch wins a tie.
 *
 * @param state - Current tracked state
 * @param snapshot - Candidate snapshot
 * @returns True when snapshot should become the tracked one
 */
export function shouldAccept(state: TrackedState, snapshot: Snapshot): boolean {
  if (snapshot.resolvedInstant === null) {
    return false;
  }
  return snapshot.resolvedInstant >= state.instant;
}

/**
 * Create a freshness tracker
 *
 * @param initial - Starting state (defaults to the empty state)
 * @returns Tracker with consider/current/hasSnapshot
 *
 * @example
 * ```typescript
 * const tracker = createFreshnessTracker();
 * tracker.consider(newer); // true
 * tracker.consider(older); // false, newer stays tracked
 * ```
 */
export function createFreshnessTracker(initial?: TrackedState): FreshnessTracker {
  let state: TrackedState = initial || createInitialTrackedState();

  function consider(snapshot: Snapshot): boolean {
    if (!shouldAccept(state, snapshot) || snapshot.resolvedInstant === null) {
      return false;
    }
    // Single assignment: readers see either the old pair or the new one
    state = Object.freeze({ snapshot: snapshot, instant: snapshot.resolvedInstant });
    return true;
  }

  function current(): TrackedState {
    return state;
  }

  function hasSnapshot(): boolean {
    return state.snapshot !== null;
  }

  return {
    consider: consider,
    current: current,
    hasSnapshot: hasSnapshot
  };
}
