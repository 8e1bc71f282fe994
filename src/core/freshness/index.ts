export { createFreshnessTracker, createInitialTrackedState, shouldAccept } from './freshness';
export type { TrackedState, FreshnessTracker } from './types';
