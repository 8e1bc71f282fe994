import { DEFAULT_FAULT_OPTIONS } from '@core/faults';
import { createInitialTrackedState } from '@core/freshness';
import type { Snapshot } from '@core/snapshot';
import type { TagValue } from '$types/common';

import { summarizeHealth } from './health';
import { DEFAULT_TAG_NAMES, readMetrics, sourceStateLabel } from './helpers';
import type { HealthInputs } from './types';

function snapshot(rawTimestamp: string | number | undefined, resolvedInstant: number | null, tags: Array<[string, TagValue]>): Snapshot {
  return { rawTimestamp: rawTimestamp, resolvedInstant: resolvedInstant, tags: new Map(tags), shape: 'flat' };
}

function inputs(overrides: Partial<HealthInputs>): HealthInputs {
  return {
    tracked: createInitialTrackedState(),
    latest: null,
    nowSec: 1700000000,
    thresholds: { slowThresholdSec: 80, offlineThresholdSec: 300 },
    faultTable: new Map([[2, 'Water coolant primary flow reads off']]),
    faultOptions: DEFAULT_FAULT_OPTIONS,
    tagNames: DEFAULT_TAG_NAMES,
    ...overrides
  };
}

describe('health', () => {
  describe('summarizeHealth', () => {
    it('should be CONNECTING before anything arrives', () => {
      const summary = summarizeHealth(inputs({}));

      expect(summary.status).toBe('CONNECTING');
      expect(summary.elapsedSec).toBeNull();
      expect(summary.lastUpdate).toBeNull();
      expect(summary.snapshot).toBeNull();
      expect(summary.tags.size).toBe(0);
      expect(summary.sourceState).toBe('UNKNOWN');
    });

    it('should report the staleness tier of the tracked snapshot', () => {
      const tracked = snapshot(1700000000, 1700000000, [['system.ionSource.general.status', 2]]);
      const summary = summarizeHealth(inputs({
        tracked: { snapshot: tracked, instant: 1700000000 },
        latest: tracked,
        nowSec: 1700000100
      }));

      expect(summary.status).toBe('SLOW');
      expect(summary.tier).toBe('SLOW');
      expect(summary.elapsedSec).toBe(100);
      expect(summary.lastUpdate).toBe('2023-11-14 22:13:20 UTC');
      expect(summary.sourceState).toBe('RUNNING');
    });

    it('should put FAULT ahead of every staleness tier', () => {
      const tracked = snapshot(1700000000, 1700000000, [['system.general.faultArray[2]', true]]);
      const summary = summarizeHealth(inputs({
        tracked: { snapshot: tracked, instant: 1700000000 },
        nowSec: 1700001000
      }));

      expect(summary.tier).toBe('OFFLINE');
      expect(summary.status).toBe('FAULT');
      expect(summary.faults.entries).toEqual([{ index: 2, description: 'Water coolant primary flow reads off' }]);
    });

    it('should be FAULT when only the system flag is set', () => {
      const tracked = snapshot(1700000000, 1700000000, [['system.general.systemFault', true]]);
      const summary = summarizeHealth(inputs({ tracked: { snapshot: tracked, instant: 1700000000 } }));

      expect(summary.status).toBe('FAULT');
      expect(summary.faults.entries).toEqual([]);
    });

    it('should be INVALID when the only snapshot has an unparsable timestamp', () => {
      const latest = snapshot('next tuesday', null, [['beamline.magnet.readbackA', 3.25]]);
      const summary = summarizeHealth(inputs({ latest: latest }));

      expect(summary.status).toBe('INVALID');
      expect(summary.tier).toBe('CONNECTING');
      expect(summary.snapshot).toBe(latest);
      expect(summary.metrics.magnetCurrentA).toBe(3.25);
    });

    it('should stay CONNECTING when the only snapshot has no timestamp at all', () => {
      const latest = snapshot(undefined, null, [['a', 1]]);
      expect(summarizeHealth(inputs({ latest: latest })).status).toBe('CONNECTING');
    });

    it('should keep showing the tracked snapshot after a later invalid one', () => {
      const tracked = snapshot(1700000000, 1700000000, [['a', 1]]);
      const latest = snapshot('garbled', null, [['a', 2]]);
      const summary = summarizeHealth(inputs({
        tracked: { snapshot: tracked, instant: 1700000000 },
        latest: latest,
        nowSec: 1700000010
      }));

      expect(summary.status).toBe('ONLINE');
      expect(summary.snapshot).toBe(tracked);
      expect(summary.tags.get('a')).toBe(1);
    });
  });

  describe('sourceStateLabel', () => {
    it('should map known status codes', () => {
      const key = DEFAULT_TAG_NAMES.sourceStatus;
      expect(sourceStateLabel(new Map([[key, 0]]), key)).toBe('OFF');
      expect(sourceStateLabel(new Map([[key, 1]]), key)).toBe('STARTING');
      expect(sourceStateLabel(new Map([[key, 99]]), key)).toBe('FAULT');
    });

    it('should show unknown codes as-is', () => {
      const key = DEFAULT_TAG_NAMES.sourceStatus;
      expect(sourceStateLabel(new Map([[key, 7]]), key)).toBe('7');
      expect(sourceStateLabel(new Map([[key, 'manual']]), key)).toBe('manual');
    });
  });

  describe('readMetrics', () => {
    it('should read headline tags with 0 defaults', () => {
      const tags = new Map([
        ['system.ionSource.general.beamVoltage', 20.5],
        ['system.vacuumSystem.gauges.source.readback_mB', 0.00012],
      ]);
      expect(readMetrics(tags, DEFAULT_TAG_NAMES)).toEqual({
        beamVoltageKv: 20.5,
        sourcePressureMbar: 0.00012,
        magnetCurrentA: 0
      });
    });

    it('should accept the legacy beam voltage key', () => {
      const tags = new Map([['ionSource.general.beamVoltage', 18]]);
      expect(readMetrics(tags, DEFAULT_TAG_NAMES).beamVoltageKv).toBe(18);
    });

    it('should return zeros without tags', () => {
      expect(readMetrics(null, DEFAULT_TAG_NAMES)).toEqual({ beamVoltageKv: 0, sourcePressureMbar: 0, magnetCurrentA: 0 });
    });
  });
});
