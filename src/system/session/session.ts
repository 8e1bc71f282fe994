/**
 * Dashboard session
 *
 * Owns one fetch → parse → track cycle and the state that survives between
 * cycles: the freshness tracker, the latest parsed snapshot, poll counters
 * and the last reported health status.
 *
 * Every failure stays local to the cycle that hit it. The tracked snapshot
 * is only ever replaced by a newer one, so a bad or stale fetch never moves
 * the display backwards.
 */

import { DEFAULT_TAG_NAMES, summarizeHealth } from '@core/health';
import { parseSnapshot } from '@core/snapshot';
import { formatInstant } from '@core/timestamp';
import { formatDuration } from '@utils/time';
import { EmptyPayloadError, UnresolvedTimestampError } from '$types/errors';

import type { HealthStatus, HealthSummary } from '@core/health';
import type { Snapshot } from '@core/snapshot';
import type { PayloadError } from '$types/errors';
import type { DashboardSession, DashboardSessionOptions, PollOutcome, SessionStats } from './types';

/**
 * Describe a raw timestamp for log lines
 * @param raw - Timestamp as delivered
 * @returns JSON text, or "missing"
 */
function describeRawTimestamp(raw: unknown): string {
  if (raw === undefined) return 'missing';
  return JSON.stringify(raw);
}

/**
 * Fault text for a FAULT transition
 * @param summary - Health summary in FAULT
 * @returns Active fault descriptions, or the generic fallback
 */
function describeFaults(summary: HealthSummary): string {
  const entries = summary.faults.entries;
  if (entries.length === 0) {
    return 'System fault flag set, check logs';
  }
  const parts: string[] = [];
  for (let i = 0; i < entries.length; i++) {
    parts.push('#' + entries[i].index + ' ' + entries[i].description);
  }
  return parts.join('; ');
}

/**
 * Create a dashboard session
 *
 * @param options - Transport, tracker, logger, clock and decoding settings
 * @returns Session with poll/summary/stats
 *
 * @example
 * ```typescript
 * const session = createDashboardSession({
 *   transport: createTransport(CONFIG, deps),
 *   tracker: createFreshnessTracker(),
 *   logger: logger,
 *   clock: now,
 *   thresholds: { slowThresholdSec: 80, offlineThresholdSec: 300 },
 *   faultTable: loadFaultTable(''),
 *   faultOptions: DEFAULT_FAULT_OPTIONS
 * });
 * await session.poll();
 * render(session.summary());
 * ```
 */
export function createDashboardSession(options: DashboardSessionOptions): DashboardSession {
  const transport = options.transport;
  const tracker = options.tracker;
  const logger = options.logger;
  const tagNames = options.tagNames || DEFAULT_TAG_NAMES;

  const counters: SessionStats = {
    polls: 0,
    accepted: 0,
    outOfOrder: 0,
    unresolved: 0,
    empty: 0,
    malformed: 0
  };

  let latestSnapshot: Snapshot | null = null;
  let receivedAt: number | null = null;
  let lastProblem: PayloadError | UnresolvedTimestampError | null = null;
  let lastStatus: HealthStatus = 'CONNECTING';
  let inFlight: Promise<PollOutcome> | null = null;

  /**
   * Count an outcome
   * @param outcome - Poll outcome
   * @returns The same outcome
   */
  function record(outcome: PollOutcome): PollOutcome {
    counters.polls++;
    if (outcome === 'accepted') counters.accepted++;
    if (outcome === 'out-of-order') counters.outOfOrder++;
    if (outcome === 'unresolved') counters.unresolved++;
    if (outcome === 'empty') counters.empty++;
    if (outcome === 'malformed') counters.malformed++;
    return outcome;
  }

  /**
   * Fetch the newest payload, mapping unexpected transport exceptions to null
   * @returns Raw payload or null
   */
  async function fetchPayload(): Promise<string | null> {
    try {
      return await transport.fetchLatest();
    } catch (err) {
      logger.warning(transport.name + ' transport error: ' + (err instanceof Error ? err.message : String(err)));
      return null;
    }
  }

  async function runPoll(): Promise<PollOutcome> {
    const raw = await fetchPayload();
    const result = parseSnapshot(raw, transport.unwrap);

    if (!result.ok) {
      lastProblem = result.error;
      if (result.error instanceof EmptyPayloadError) {
        logger.debug('No snapshot from ' + transport.name + ': ' + result.error.message);
        return record('empty');
      }
      logger.warning('Malformed snapshot from ' + transport.name + ': ' + result.error.message);
      return record('malformed');
    }

    const snapshot = result.snapshot;
    latestSnapshot = snapshot;
    receivedAt = options.clock();

    if (snapshot.resolvedInstant === null) {
      const rawText = describeRawTimestamp(snapshot.rawTimestamp);
      lastProblem = new UnresolvedTimestampError('Snapshot timestamp unresolved: ' + rawText, snapshot.rawTimestamp);
      logger.warning(lastProblem.message);
      return record('unresolved');
    }

    const first = !tracker.hasSnapshot();

    if (!tracker.consider(snapshot)) {
      logger.debug('Ignoring out-of-order snapshot from ' + formatInstant(snapshot.resolvedInstant) +
        ' (tracking ' + formatInstant(tracker.current().instant) + ')');
      return record('out-of-order');
    }

    lastProblem = null;
    if (first) {
      logger.info('First snapshot accepted from ' + transport.name + ', published ' + formatInstant(snapshot.resolvedInstant));
    } else {
      logger.debug('Accepted snapshot published ' + formatInstant(snapshot.resolvedInstant));
    }
    return record('accepted');
  }

  /**
   * Run one poll cycle
   * A call made while a poll is in flight returns that poll's promise.
   * @returns Poll outcome
   */
  function poll(): Promise<PollOutcome> {
    if (inFlight) {
      return inFlight;
    }
    const current = runPoll().finally(function() {
      inFlight = null;
    });
    inFlight = current;
    return current;
  }

  /**
   * Log a status change once
   * @param summary - New health summary
   */
  function logTransition(summary: HealthSummary): void {
    const previous = lastStatus;
    const status = summary.status;
    if (status === previous) return;
    lastStatus = status;

    const elapsed = summary.elapsedSec === null ? 'n/a' : formatDuration(summary.elapsedSec);

    if (status === 'FAULT') {
      logger.critical('Source FAULT: ' + describeFaults(summary));
    } else if (status === 'OFFLINE') {
      logger.warning('Source OFFLINE: no update for ' + elapsed);
    } else if (status === 'SLOW') {
      logger.warning('Source SLOW: last update ' + elapsed + ' ago');
    } else if (status === 'INVALID') {
      logger.warning('Source INVALID: snapshot timestamp could not be parsed');
    } else if (status === 'ONLINE') {
      if (previous === 'CONNECTING') {
        logger.info('Source ONLINE');
      } else {
        logger.info('Source recovered: ONLINE (was ' + previous + ')');
      }
    }
  }

  /**
   * Derive the health summary
   * @param nowSec - Current time in seconds (defaults to the session clock)
   * @returns Health summary
   */
  function summary(nowSec?: number): HealthSummary {
    const result = summarizeHealth({
      tracked: tracker.current(),
      latest: latestSnapshot,
      nowSec: nowSec === undefined ? options.clock() : nowSec,
      thresholds: options.thresholds,
      faultTable: options.faultTable,
      faultOptions: options.faultOptions,
      tagNames: tagNames
    });
    logTransition(result);
    return result;
  }

  function stats(): SessionStats {
    return {
      polls: counters.polls,
      accepted: counters.accepted,
      outOfOrder: counters.outOfOrder,
      unresolved: counters.unresolved,
      empty: counters.empty,
      malformed: counters.malformed
    };
  }

  function latest(): Snapshot | null {
    return latestSnapshot;
  }

  function lastError(): PayloadError | UnresolvedTimestampError | null {
    return lastProblem;
  }

  function lastReceived(): number | null {
    return receivedAt;
  }

  return {
    poll: poll,
    summary: summary,
    stats: stats,
    latest: latest,
    lastError: lastError,
    lastReceived: lastReceived
  };
}
