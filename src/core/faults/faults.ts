/**
 * Fault decoding
 * Scans the fault bit array and system fault flag of a snapshot's tags
 */

import type { TagMap } from '$types/common';
import type { FaultDecoderOptions, FaultEntry, FaultReport, FaultTable } from './types';
import { DEFAULT_FAULT_OPTIONS, faultKey, isFaultActive, unmappedDescription } from './helpers';

/**
 * Decode active faults
 *
 * Scans "<prefix>[0]" .. "<prefix>[size-1]" in ascending order. Missing
 * keys are inactive. When the system fault flag is set but no bit is
 * active, the report is active with an empty entry list; the caller shows
 * a generic fallback.
 *
 * @param tags - Snapshot tags, or null when no snapshot is available
 * @param table - Index → description table
 * @param options - Tag names and scan size
 * @returns Fault report
 *
 * @example
 * ```typescript
 * const report = decodeFaults(snapshot.tags, table);
 * report.entries; // [{ index: 2, description: 'Water coolant primary flow reads off' }]
 * ```
 */
export function decodeFaults(
  tags: TagMap | null | undefined,
  table: FaultTable,
  options: FaultDecoderOptions = DEFAULT_FAULT_OPTIONS
): FaultReport {
  const entries: FaultEntry[] = [];

  if (!tags) {
    return { active: false, systemFault: false, entries: entries };
  }

  for (let i = 0; i < options.faultArraySize; i++) {
    if (isFaultActive(tags.get(faultKey(options.faultArrayPrefix, i)))) {
      entries.push({ index: i, description: table.get(i) || unmappedDescription(i) });
    }
  }

  const systemFault = isFaultActive(tags.get(options.systemFaultTag));

  return {
    active: systemFault || entries.length > 0,
    systemFault: systemFault,
    entries: entries
  };
}
