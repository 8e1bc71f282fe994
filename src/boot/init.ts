/**
 * Dashboard initialization
 */

import { loadFaultTable } from './fault-table';
import { createFreshnessTracker } from '@core/freshness';
import { createLogger, createConsoleSink, createFileSink, createSlackSink, openAppendStream } from '@logging';
import { createDashboardSession } from '@system/session';
import { createTransport } from '@transport';
import { createNodeTimer, now } from '@utils/time';
import { validateConfig } from '@validation';
import { ConfigValidationError } from '$types/errors';

import type { FileSink, InitMessage, SinkWithLevel } from '@logging';
import type { DashboardConfig } from '$types';
import type { Dashboard, InitDependencies } from './types';

/**
 * Host services backed by Node
 * @returns Global fetch, wall clock, unref'd timers, console and fs streams
 */
export function createDefaultDependencies(): InitDependencies {
  return {
    fetchFn: fetch,
    clock: now,
    timer: createNodeTimer(),
    consoleApi: console,
    openStream: openAppendStream
  };
}

/**
 * Validate configuration and wire logger, transport and session
 *
 * @param config - Complete configuration
 * @param deps - Host services
 * @param onReady - Called once every log sink has initialized
 * @returns Wired dashboard
 * @throws {ConfigValidationError} If the configuration has errors
 * @throws {FaultTableValidationError} If the fault table cannot be loaded
 */
export function initialize(
  config: DashboardConfig,
  deps: InitDependencies,
  onReady?: (dashboard: Dashboard) => void
): Dashboard {
  // Validate configuration
  const validation = validateConfig(config);

  if (!validation.valid) {
    throw new ConfigValidationError('Invalid configuration', validation.errors.map(function(err) {
      return '[' + err.field + ']: ' + err.message;
    }));
  }

  validation.warnings.forEach(function(warn) {
    deps.consoleApi.warn('  [' + warn.field + ']: ' + warn.message);
  });

  const faultTable = loadFaultTable(config.FAULT_TABLE_PATH);

  // Setup logging
  const sinks: SinkWithLevel[] = [];
  let fileSink: FileSink | null = null;

  if (config.CONSOLE_ENABLED) {
    const consoleSink = createConsoleSink(deps.timer, deps.consoleApi, {
      bufferSize: config.CONSOLE_BUFFER_SIZE,
      drainInterval: config.CONSOLE_INTERVAL_MS
    });
    sinks.push({ sink: consoleSink, minLevel: config.CONSOLE_LOG_LEVEL });
  }

  if (config.LOG_TO_FILE) {
    fileSink = createFileSink({ path: config.LOG_FILE_PATH }, {
      openStream: deps.openStream,
      timeSource: deps.clock
    });
    sinks.push({ sink: fileSink, minLevel: config.FILE_LOG_LEVEL });
  }

  if (config.SLACK_ENABLED) {
    const slackSink = createSlackSink(deps.fetchFn, deps.timer, {
      enabled: config.SLACK_ENABLED,
      webhookUrl: config.SLACK_WEBHOOK_URL,
      bufferSize: config.SLACK_BUFFER_SIZE,
      retryDelayMs: config.SLACK_RETRY_DELAY_SEC * 1000,
      maxRetries: config.SLACK_MAX_RETRIES,
      timeoutMs: config.FETCH_TIMEOUT_MS
    });
    sinks.push({ sink: slackSink, minLevel: config.SLACK_LOG_LEVEL });
  }

  const logger = createLogger({
    level: config.GLOBAL_LOG_LEVEL,
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: deps.clock,
    sinks: sinks
  }, config.LOG_LEVELS);

  const transport = createTransport(config, {
    fetchFn: deps.fetchFn,
    logger: logger,
    clock: deps.clock,
    timeoutMs: config.FETCH_TIMEOUT_MS,
    userAgent: config.USER_AGENT
  });

  const session = createDashboardSession({
    transport: transport,
    tracker: createFreshnessTracker(),
    logger: logger,
    clock: deps.clock,
    thresholds: {
      slowThresholdSec: config.SLOW_THRESHOLD_SEC,
      offlineThresholdSec: config.OFFLINE_THRESHOLD_SEC
    },
    faultTable: faultTable,
    faultOptions: {
      faultArrayPrefix: config.FAULT_ARRAY_PREFIX,
      faultArraySize: config.FAULT_ARRAY_SIZE,
      systemFaultTag: config.SYSTEM_FAULT_TAG
    },
    tagNames: {
      sourceStatus: config.SOURCE_STATUS_TAG,
      beamVoltage: config.BEAM_VOLTAGE_TAGS,
      sourcePressure: config.SOURCE_PRESSURE_TAG,
      magnetCurrent: config.MAGNET_CURRENT_TAG
    }
  });

  function shutdown(): void {
    logger.flush();
    if (fileSink) {
      fileSink.close();
    }
  }

  const dashboard: Dashboard = {
    config: config,
    logger: logger,
    transport: transport,
    session: session,
    shutdown: shutdown
  };

  // Initialize logger and call onReady when done
  logger.initialize(function(_success: boolean, messages: InitMessage[]) {
    // Log startup message FIRST
    logger.info('🚀 Ion Source Dashboard v1.0');
    logger.info('📡 ' + transport.name + ' | ⏱️ poll:' + config.POLL_INTERVAL_MS + 'ms offline:' + config.OFFLINE_POLL_INTERVAL_MS + 'ms | 🐢 SLOW>' + config.SLOW_THRESHOLD_SEC + 's OFFLINE>' + config.OFFLINE_THRESHOLD_SEC + 's | 🧯 faults:' + faultTable.size + ' known');

    // Sink failures go straight to the console; the failed sink may be the one logging them
    for (let i = 0; i < messages.length; i++) {
      if (!messages[i].success) {
        deps.consoleApi.log('⚠️ [WARNING]  ' + messages[i].message);
      }
    }

    if (onReady) {
      onReady(dashboard);
    }
  });

  return dashboard;
}
