/**
 * Health summary
 * Derives the displayed status from tracked state, the latest parse and the clock
 */

import { decodeFaults } from '@core/faults';
import { classifyStaleness, elapsedSince } from '@core/staleness';
import { formatInstant, hasRawTimestamp } from '@core/timestamp';

import type { TagMap } from '$types/common';
import type { HealthInputs, HealthStatus, HealthSummary } from './types';
import { readMetrics, sourceStateLabel } from './helpers';

const NO_TAGS: TagMap = new Map();

/**
 * Summarize health for rendering
 *
 * Status precedence:
 * 1. FAULT when the displayed tags decode to an active fault
 * 2. INVALID when nothing was accepted and the latest snapshot's timestamp did not resolve
 * 3. the staleness tier of the tracked snapshot
 *
 * The tracked snapshot is displayed; before the first acceptance the latest
 * parsed snapshot is displayed instead so its tags remain visible.
 *
 * @param inputs - Tracked state, latest snapshot, clock and configuration
 * @returns Health summary
 */
export function summarizeHealth(inputs: HealthInputs): HealthSummary {
  const tracked = inputs.tracked;
  const accepted = tracked.snapshot !== null;
  const displayed = tracked.snapshot || inputs.latest;
  const tags = displayed ? displayed.tags : NO_TAGS;

  const instant = accepted ? tracked.instant : null;
  const tier = classifyStaleness(inputs.nowSec, instant, inputs.thresholds);
  const faults = decodeFaults(tags, inputs.faultTable, inputs.faultOptions);

  const latest = inputs.latest;
  const invalid = !accepted && latest !== null &&
    latest.resolvedInstant === null && hasRawTimestamp(latest.rawTimestamp);

  let status: HealthStatus = tier;
  if (faults.active) {
    status = 'FAULT';
  } else if (invalid) {
    status = 'INVALID';
  }

  return {
    status: status,
    tier: tier,
    elapsedSec: instant === null ? null : elapsedSince(inputs.nowSec, instant),
    lastUpdateInstant: instant,
    lastUpdate: instant === null ? null : formatInstant(instant),
    snapshot: displayed,
    tags: tags,
    faults: faults,
    sourceState: sourceStateLabel(tags, inputs.tagNames.sourceStatus),
    metrics: readMetrics(tags, inputs.tagNames)
  };
}
