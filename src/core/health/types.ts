/**
 * Health summary type definitions
 */

import type { FaultDecoderOptions, FaultReport, FaultTable } from '@core/faults';
import type { TrackedState } from '@core/freshness';
import type { Snapshot } from '@core/snapshot';
import type { StalenessThresholds, StalenessTier } from '@core/staleness';
import type { TagMap } from '$types/common';

/**
 * Displayed health of the instrument link
 * - CONNECTING: nothing accepted yet
 * - ONLINE / SLOW / OFFLINE: staleness tiers
 * - FAULT: fault condition active (overrides every tier)
 * - INVALID: a snapshot arrived but its timestamp could not be parsed
 */
export type HealthStatus = StalenessTier | 'FAULT' | 'INVALID';

/**
 * Tag keys of the headline readings
 */
export interface HealthTagNames {
  /** Ion source state code (0=OFF, 1=STARTING, 2=RUNNING, 99=FAULT) */
  sourceStatus: string;
  /** Beam voltage in kV; first key present wins */
  beamVoltage: readonly string[];
  /** Source vacuum gauge readback in mbar */
  sourcePressure: string;
  /** Analysing magnet current readback in A */
  magnetCurrent: string;
}

/**
 * Headline readings shown as cards
 */
export interface SourceMetrics {
  beamVoltageKv: number;
  sourcePressureMbar: number;
  magnetCurrentA: number;
}

/**
 * Everything needed to derive a summary
 */
export interface HealthInputs {
  /** Freshness tracker state */
  tracked: TrackedState;
  /** Latest successfully parsed snapshot, accepted or not */
  latest: Snapshot | null;
  /** Current time in seconds */
  nowSec: number;
  thresholds: StalenessThresholds;
  faultTable: FaultTable;
  faultOptions: FaultDecoderOptions;
  tagNames: HealthTagNames;
}

/**
 * View model handed to the renderer
 */
export interface HealthSummary {
  status: HealthStatus;
  /** Staleness tier before fault/invalid override */
  tier: StalenessTier;
  /** Seconds since the tracked snapshot, null before the first acceptance */
  elapsedSec: number | null;
  /** Tracked instant, null before the first acceptance */
  lastUpdateInstant: number | null;
  /** Pretty-printed tracked instant */
  lastUpdate: string | null;
  /** Snapshot whose tags are displayed */
  snapshot: Snapshot | null;
  tags: TagMap;
  faults: FaultReport;
  /** Ion source state label */
  sourceState: string;
  metrics: SourceMetrics;
}
