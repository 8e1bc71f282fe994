/**
 * Staleness classification type definitions
 */

/**
 * Health tier derived from elapsed time alone (no fault override)
 */
export type StalenessTier = 'CONNECTING' | 'ONLINE' | 'SLOW' | 'OFFLINE';

/**
 * Tier boundaries in seconds
 *
 * Defaults assume the publisher pushes roughly every 60 s.
 */
export interface StalenessThresholds {
  /** Elapsed seconds above which the connection is flagged as degraded */
  slowThresholdSec: number;

  /** Elapsed seconds above which the source is considered disconnected */
  offlineThresholdSec: number;
}
