import type { DashboardUserConfig, DashboardAppConstants, DashboardConfig } from '../types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything an operator might reasonably tune for the source,
//   health tiers, polling, and observability.
//   Environment variables override these in tools/dashboard/config.ts.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<DashboardUserConfig> = {
  // TRANSPORT
  //   Role: How snapshots reach the dashboard (gist | relay | topic).
  //   Critical: One of the three transports.
  //   Recommended: gist for the plain raw-file setup; topic when no token can be shared.
  TRANSPORT: 'gist',

  // SOURCE_URL
  //   Role: Raw file URL (gist) or latest-message endpoint (relay).
  //   Critical: Absolute http(s) URL when TRANSPORT is gist or relay.
  //   Recommended: Use the raw URL without a revision hash so it follows the latest upload.
  SOURCE_URL: '',

  // RELAY_ENVELOPE_FIELD
  //   Role: Envelope field holding the snapshot when TRANSPORT is relay.
  //   Critical: Non-empty when TRANSPORT is relay.
  //   Recommended: 'message'.
  RELAY_ENVELOPE_FIELD: 'message',

  // TOPIC_SERVER / TOPIC_NAME
  //   Role: Notification server and topic polled when TRANSPORT is topic.
  //   Critical: http(s) server URL; topic of 1–64 letters, digits, '-' or '_'.
  //   Recommended: A long, unguessable topic name; anyone who knows it can publish.
  TOPIC_SERVER: 'https://ntfy.sh',
  TOPIC_NAME: '',

  // FETCH_TIMEOUT_MS
  //   Role: Upper bound on one fetch, after which the cycle counts as empty.
  //   Critical: Integer 500–30000 ms.
  //   Recommended: 2000–10000 ms; 5000 ms matches the poll interval.
  FETCH_TIMEOUT_MS: 5000,

  // SLOW_THRESHOLD_SEC
  //   Role: Seconds since the last accepted snapshot above which the link is SLOW.
  //   Critical: 1–86400 s.
  //   Recommended: ~1.3× the publish interval; 80 s for a 60 s publisher.
  SLOW_THRESHOLD_SEC: 80,

  // OFFLINE_THRESHOLD_SEC
  //   Role: Seconds since the last accepted snapshot above which the source is OFFLINE.
  //   Critical: 1–604800 s and greater than SLOW_THRESHOLD_SEC.
  //   Recommended: ~5× the publish interval; 300 s for a 60 s publisher.
  OFFLINE_THRESHOLD_SEC: 300,

  // FAULT_ARRAY_SIZE
  //   Role: Number of fault bits scanned, starting at index 0.
  //   Critical: Integer 1–1024.
  //   Recommended: 99, the size the instrument publishes.
  FAULT_ARRAY_SIZE: 99,

  // FAULT_TABLE_PATH
  //   Role: JSON file mapping fault index to description; empty uses the built-in table.
  //   Critical: Readable JSON object of integer keys to non-empty strings when set.
  //   Recommended: Empty unless the instrument's PLC program changes.
  FAULT_TABLE_PATH: '',

  // POLL_INTERVAL_MS
  //   Role: Delay between polls while the source is not OFFLINE.
  //   Critical: Integer 1000–600000 ms.
  //   Recommended: 2000–60000 ms; 5000 ms keeps the view current without hammering the host.
  POLL_INTERVAL_MS: 5000,

  // OFFLINE_POLL_INTERVAL_MS
  //   Role: Delay between polls while the source is OFFLINE.
  //   Critical: Integer 1000–3600000 ms.
  //   Recommended: ≥ POLL_INTERVAL_MS (warning otherwise); 30000 ms.
  OFFLINE_POLL_INTERVAL_MS: 30000,

  // SLACK_ENABLED
  //   Role: Master switch for Slack notifications.
  //   Critical: Boolean only.
  //   Recommended: true when someone should hear about OFFLINE and FAULT away from the screen.
  SLACK_ENABLED: false,

  // SLACK_WEBHOOK_URL
  //   Role: Incoming webhook URL messages are posted to.
  //   Critical: http(s) URL when SLACK_ENABLED = true.
  //   Recommended: Keep it in .env, never in this file.
  SLACK_WEBHOOK_URL: '',

  // SLACK_LOG_LEVEL
  //   Role: Minimum log severity sent to Slack (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 2 (WARNING); lower levels post every poll.
  SLACK_LOG_LEVEL: 2,

  // SLACK_BUFFER_SIZE
  //   Role: Maximum number of Slack messages held for retry.
  //   Critical: 1–100.
  //   Recommended: 10.
  SLACK_BUFFER_SIZE: 10,

  // SLACK_RETRY_DELAY_SEC
  //   Role: Delay (s) before the first retry of a failed Slack send; doubles per retry up to 60 s.
  //   Critical: 1–600 s.
  //   Recommended: 5 s.
  SLACK_RETRY_DELAY_SEC: 5,

  // CONSOLE_ENABLED
  //   Role: Master switch for console logging.
  //   Critical: Boolean only.
  //   Recommended: true.
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity written to the console (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation.
  CONSOLE_LOG_LEVEL: 1,

  // CONSOLE_BUFFER_SIZE
  //   Role: Maximum number of queued console log messages.
  //   Critical: 10–10000.
  //   Recommended: 100.
  CONSOLE_BUFFER_SIZE: 100,

  // CONSOLE_INTERVAL_MS
  //   Role: Interval between console drains in ms.
  //   Critical: 10–5000 ms.
  //   Recommended: 250 ms.
  CONSOLE_INTERVAL_MS: 250,

  // LOG_TO_FILE
  //   Role: Append log lines to LOG_FILE_PATH.
  //   Critical: Boolean only.
  //   Recommended: true for unattended screens, so there is a record after the fact.
  LOG_TO_FILE: false,

  // LOG_FILE_PATH
  //   Role: Log file location; parent directories are created.
  //   Critical: Non-empty when LOG_TO_FILE = true.
  //   Recommended: 'logs/dashboard.log'.
  LOG_FILE_PATH: 'logs/dashboard.log',

  // FILE_LOG_LEVEL
  //   Role: Minimum log severity written to the file (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 0 (DEBUG); the file is for after-the-fact diagnosis.
  FILE_LOG_LEVEL: 0,

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL); acts as a floor for every sink.
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO); 0 (DEBUG) only while diagnosing a transport.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Uptime after which INFO messages are suppressed (0 disables).
  //   Critical: 0–720 h.
  //   Recommended: 24 h.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 24,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Tag names and limits that follow the instrument's publisher,
//   not the operator.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<DashboardAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct; *_LOG_LEVEL settings must use these.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // FAULT_ARRAY_PREFIX / SYSTEM_FAULT_TAG
  //   Role: Where the publisher puts fault bits and the summary fault flag.
  //   Critical: Must match the publisher's tag names exactly; keys are flat strings.
  FAULT_ARRAY_PREFIX: 'system.general.faultArray',
  SYSTEM_FAULT_TAG: 'system.general.systemFault',

  // SOURCE_STATUS_TAG
  //   Role: Ion source state code (0=OFF, 1=STARTING, 2=RUNNING, 99=FAULT).
  SOURCE_STATUS_TAG: 'system.ionSource.general.status',

  // BEAM_VOLTAGE_TAGS
  //   Role: Beam voltage in kV; first key present wins.
  //   Recommended: Keep the legacy key until every publisher is updated.
  BEAM_VOLTAGE_TAGS: ['system.ionSource.general.beamVoltage', 'ionSource.general.beamVoltage'],

  // SOURCE_PRESSURE_TAG / MAGNET_CURRENT_TAG
  //   Role: Source vacuum gauge (mbar) and analysing magnet current (A).
  SOURCE_PRESSURE_TAG: 'system.vacuumSystem.gauges.source.readback_mB',
  MAGNET_CURRENT_TAG: 'beamline.magnet.readbackA',

  // USER_AGENT
  //   Role: User-Agent header sent with every fetch.
  USER_AGENT: 'ion-source-dashboard/1.0',

  // SLACK_MAX_RETRIES
  //   Role: Retries before a Slack message is dropped.
  //   Critical: ≥1.
  SLACK_MAX_RETRIES: 5,
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
// ─────────────────────────────────────────────────────────────

/**
 * Merge app constants with user settings
 * @param userConfig - User settings (defaults with overrides applied)
 * @returns Complete configuration
 */
export function buildConfig(userConfig: DashboardUserConfig): DashboardConfig {
  return { ...APP_CONSTANTS, ...userConfig };
}

const CONFIG: DashboardConfig = buildConfig(USER_CONFIG);

export default CONFIG;
