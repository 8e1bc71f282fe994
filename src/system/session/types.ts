/**
 * Dashboard session type definitions
 */

import type { FaultDecoderOptions, FaultTable } from '@core/faults';
import type { FreshnessTracker } from '@core/freshness';
import type { HealthSummary, HealthTagNames } from '@core/health';
import type { Snapshot } from '@core/snapshot';
import type { StalenessThresholds } from '@core/staleness';
import type { Logger } from '@logging';
import type { Transport } from '@transport';
import type { Clock } from '$types';
import type { PayloadError, UnresolvedTimestampError } from '$types/errors';

/**
 * Result of one poll cycle
 * - accepted: snapshot became the tracked one
 * - out-of-order: snapshot parsed and resolved but older than the tracked one
 * - unresolved: snapshot parsed but its timestamp is missing or unparsable
 * - empty: nothing to parse (transport failure, no message, placeholder)
 * - malformed: payload was not well-formed structured data
 */
export type PollOutcome = 'accepted' | 'out-of-order' | 'unresolved' | 'empty' | 'malformed';

/**
 * Poll counters since the session started
 */
export interface SessionStats {
  polls: number;
  accepted: number;
  outOfOrder: number;
  unresolved: number;
  empty: number;
  malformed: number;
}

/**
 * Collaborators of a dashboard session
 */
export interface DashboardSessionOptions {
  transport: Transport;
  tracker: FreshnessTracker;
  logger: Logger;
  clock: Clock;
  thresholds: StalenessThresholds;
  faultTable: FaultTable;
  faultOptions: FaultDecoderOptions;
  /** Headline tag keys; defaults to the instrument's standard names */
  tagNames?: HealthTagNames;
}

/**
 * One dashboard's fetch-parse-track loop state
 */
export interface DashboardSession {
  /** Run one poll cycle; never rejects */
  poll(): Promise<PollOutcome>;
  /** Derive the health summary and log status transitions */
  summary(nowSec?: number): HealthSummary;
  /** Poll counters */
  stats(): SessionStats;
  /** Latest parsed snapshot, accepted or not */
  latest(): Snapshot | null;
  /** Most recent reason a poll did not produce an accepted snapshot */
  lastError(): PayloadError | UnresolvedTimestampError | null;
  /** Session clock time of the last poll that parsed a snapshot, null before any */
  lastReceived(): number | null;
}
