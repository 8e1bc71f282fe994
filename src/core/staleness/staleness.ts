/**
 * Staleness classification
 * Maps time since the tracked snapshot into a small ordered set of tiers
 */

import { isFiniteNumber } from '@utils/number';

import type { StalenessThresholds, StalenessTier } from './types';
import { elapsedSince } from './helpers';

/**
 * Classify how stale the tracked snapshot is
 *
 * - no instant (or -Infinity before first acceptance) → CONNECTING
 * - elapsed > offlineThresholdSec → OFFLINE
 * - elapsed > slowThresholdSec → SLOW
 * - otherwise → ONLINE
 *
 * Boundaries are exclusive: elapsed equal to a threshold stays in the lower tier.
 *
 * @param nowSec - Current time in seconds
 * @param bestInstant - Tracked instant, or null when nothing was accepted
 * @param thresholds - Tier boundaries
 * @returns Staleness tier
 */
export function classifyStaleness(
  nowSec: number,
  bestInstant: number | null,
  thresholds: StalenessThresholds
): StalenessTier {
  if (bestInstant === null || !isFiniteNumber(bestInstant)) {
    return 'CONNECTING';
  }

  const elapsed = elapsedSince(nowSec, bestInstant);

  if (elapsed > thresholds.offlineThresholdSec) {
    return 'OFFLINE';
  }
  if (elapsed > thresholds.slowThresholdSec) {
    return 'SLOW';
  }
  return 'ONLINE';
}
