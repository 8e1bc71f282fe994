/**
 * Tests for dashboard initialization
 */

import { USER_CONFIG, buildConfig } from './config';
import { initialize } from './init';
import { ConfigValidationError, FaultTableValidationError } from '$types/errors';

import type { DashboardConfig, DashboardUserConfig, FetchFn } from '$types';
import type { Dashboard, InitDependencies } from './types';

const T = 1700000000;
const SOURCE_URL = 'https://gist.example.test/raw/status.json';
const WEBHOOK = 'https://hooks.example.test/services/test-secret';

function makeConfig(overrides: Partial<DashboardUserConfig> = {}): DashboardConfig {
  return buildConfig({ ...USER_CONFIG, SOURCE_URL: SOURCE_URL, ...overrides });
}

function createMockDeps(body = '{"timestamp":1700000000}') {
  const stream = { write: vi.fn(), end: vi.fn() };
  const deps = {
    fetchFn: vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async () => new Response(body)),
    clock: vi.fn(() => T),
    timer: { set: vi.fn() },
    consoleApi: { log: vi.fn(), warn: vi.fn() },
    openStream: vi.fn(() => stream)
  };
  return { deps: deps, stream: stream };
}

describe('initialize', () => {
  describe('configuration', () => {
    it('should throw ConfigValidationError listing every error', () => {
      const { deps } = createMockDeps();
      const config = buildConfig(USER_CONFIG);

      let caught: unknown = null;
      try {
        initialize(config, deps);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ConfigValidationError);
      expect(caught instanceof ConfigValidationError && caught.problems).toEqual([
        "[SOURCE_URL]: SOURCE_URL must be an http(s) URL (got '')"
      ]);
    });

    it('should print warnings and continue', () => {
      const { deps } = createMockDeps();

      initialize(makeConfig({ OFFLINE_POLL_INTERVAL_MS: 2000 }), deps);

      expect(deps.consoleApi.warn).toHaveBeenCalledWith(
        '  [OFFLINE_POLL_INTERVAL_MS]: OFFLINE_POLL_INTERVAL_MS is shorter than POLL_INTERVAL_MS; an offline source will be polled faster than a live one'
      );
    });

    it('should throw when the fault table cannot be read', () => {
      const { deps } = createMockDeps();

      expect(() => initialize(makeConfig({ FAULT_TABLE_PATH: '/nonexistent/faults.json' }), deps))
        .toThrow(FaultTableValidationError);
    });
  });

  describe('logging', () => {
    it('should start the console drain timer and call onReady', () => {
      const { deps } = createMockDeps();
      const onReady = vi.fn();

      const dashboard = initialize(makeConfig(), deps, onReady);

      expect(deps.timer.set).toHaveBeenCalledWith(250, true, expect.any(Function));
      expect(onReady).toHaveBeenCalledWith(dashboard);
    });

    it('should log the startup banner through the console sink', () => {
      const { deps } = createMockDeps();

      const dashboard = initialize(makeConfig(), deps);
      dashboard.shutdown();

      expect(deps.consoleApi.log.mock.calls).toEqual([
        ['ℹ️ [INFO]     🚀 Ion Source Dashboard v1.0'],
        ['ℹ️ [INFO]     📡 gist | ⏱️ poll:5000ms offline:30000ms | 🐢 SLOW>80s OFFLINE>300s | 🧯 faults:20 known']
      ]);
    });

    it('should not create a console sink when disabled', () => {
      const { deps } = createMockDeps();

      initialize(makeConfig({ CONSOLE_ENABLED: false, LOG_TO_FILE: true }), deps);

      expect(deps.timer.set).not.toHaveBeenCalled();
    });

    it('should append timestamped lines to the log file and close it on shutdown', () => {
      const { deps, stream } = createMockDeps();

      const dashboard = initialize(makeConfig({ LOG_TO_FILE: true }), deps);

      expect(deps.openStream).toHaveBeenCalledWith('logs/dashboard.log');
      expect(stream.write).toHaveBeenCalledWith('2023-11-14T22:13:20.000Z ℹ️ [INFO]     🚀 Ion Source Dashboard v1.0\n');

      dashboard.shutdown();
      expect(stream.end).toHaveBeenCalledTimes(1);
    });

    it('should report a log file that cannot be opened on the console', () => {
      const { deps } = createMockDeps();
      deps.openStream.mockImplementation(() => {
        throw new Error('EACCES');
      });

      initialize(makeConfig({ LOG_TO_FILE: true }), deps);

      expect(deps.consoleApi.log).toHaveBeenCalledWith('⚠️ [WARNING]  File sink could not open logs/dashboard.log: Error: EACCES');
    });

    it('should post warnings to Slack but not INFO messages', () => {
      const { deps } = createMockDeps();

      const dashboard = initialize(makeConfig({ SLACK_ENABLED: true, SLACK_WEBHOOK_URL: WEBHOOK }), deps);
      dashboard.logger.warning('Source OFFLINE: no update for 6m 40s');

      expect(deps.fetchFn).toHaveBeenCalledTimes(1);
      expect(deps.fetchFn).toHaveBeenCalledWith(WEBHOOK, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: '⚠️ [WARNING]  Source OFFLINE: no update for 6m 40s' }),
        signal: expect.any(AbortSignal)
      });
    });
  });

  describe('session wiring', () => {
    it('should select the transport from configuration', () => {
      const { deps } = createMockDeps();

      const dashboard: Dashboard = initialize(makeConfig({ TRANSPORT: 'topic', TOPIC_NAME: 'beamline-7' }), deps);

      expect(dashboard.transport.name).toBe('topic');
    });

    it('should poll the configured source and read the configured tags', async () => {
      const { deps } = createMockDeps('{"timestamp":1700000000,"beamline.magnet.readbackA":12.5}');
      const injected: InitDependencies = deps;

      const dashboard = initialize(makeConfig(), injected);

      await expect(dashboard.session.poll()).resolves.toBe('accepted');
      expect(deps.fetchFn.mock.calls[0][0]).toBe(SOURCE_URL + '?t=1700000000000');

      const summary = dashboard.session.summary();
      expect(summary.status).toBe('ONLINE');
      expect(summary.metrics.magnetCurrentA).toBe(12.5);
    });
  });
});
