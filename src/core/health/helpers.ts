/**
 * Health summary helper functions
 */

import { getNumberTag, getTag } from '@core/tags';

import type { TagMap } from '$types/common';
import type { HealthTagNames, SourceMetrics } from './types';

export const DEFAULT_TAG_NAMES: Readonly<HealthTagNames> = {
  sourceStatus: 'system.ionSource.general.status',
  beamVoltage: ['system.ionSource.general.beamVoltage', 'ionSource.general.beamVoltage'],
  sourcePressure: 'system.vacuumSystem.gauges.source.readback_mB',
  magnetCurrent: 'beamline.magnet.readbackA'
};

const SOURCE_STATE_LABELS: Readonly<Record<number, string>> = {
  0: 'OFF',
  1: 'STARTING',
  2: 'RUNNING',
  99: 'FAULT'
};

/**
 * Ion source state label
 * @param tags - Displayed tags
 * @param key - Status tag key
 * @returns OFF/STARTING/RUNNING/FAULT, the raw value for unknown codes, UNKNOWN when missing
 */
export function sourceStateLabel(tags: TagMap | null, key: string): string {
  const value = getTag(tags, key, null);
  if (value === null) return 'UNKNOWN';
  if (typeof value === 'number' && SOURCE_STATE_LABELS[value] !== undefined) {
    return SOURCE_STATE_LABELS[value];
  }
  return String(value);
}

/**
 * Read the headline metrics, 0 when missing
 * @param tags - Displayed tags
 * @param names - Metric tag keys
 * @returns Source metrics
 */
export function readMetrics(tags: TagMap | null, names: HealthTagNames): SourceMetrics {
  let beamVoltage = 0;
  for (let i = 0; i < names.beamVoltage.length; i++) {
    if (tags && tags.has(names.beamVoltage[i])) {
      beamVoltage = getNumberTag(tags, names.beamVoltage[i], 0);
      break;
    }
  }

  return {
    beamVoltageKv: beamVoltage,
    sourcePressureMbar: getNumberTag(tags, names.sourcePressure, 0),
    magnetCurrentA: getNumberTag(tags, names.magnetCurrent, 0)
  };
}
