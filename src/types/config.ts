/**
 * Type definition for dashboard configuration
 */

import type { LogLevel, LogLevels } from '@logging';

/**
 * How snapshots reach the dashboard
 * - gist: raw file fetched over HTTP
 * - relay: pub/sub relay "latest message" endpoint returning an envelope
 * - topic: notification topic polled for its latest message
 */
export type TransportKind = 'gist' | 'relay' | 'topic';

/**
 * User-configurable settings
 * Everything an operator might reasonably tune for the source, health tiers and observability
 */
export interface DashboardUserConfig {
  // ───────── SOURCE ─────────
  readonly TRANSPORT: TransportKind;
  readonly SOURCE_URL: string;
  readonly RELAY_ENVELOPE_FIELD: string;
  readonly TOPIC_SERVER: string;
  readonly TOPIC_NAME: string;
  readonly FETCH_TIMEOUT_MS: number;

  // ───────── HEALTH TIERS ─────────
  readonly SLOW_THRESHOLD_SEC: number;
  readonly OFFLINE_THRESHOLD_SEC: number;

  // ───────── FAULTS ─────────
  readonly FAULT_ARRAY_SIZE: number;
  readonly FAULT_TABLE_PATH: string;

  // ───────── POLLING ─────────
  readonly POLL_INTERVAL_MS: number;
  readonly OFFLINE_POLL_INTERVAL_MS: number;

  // ───────── SLACK SETTINGS ─────────
  readonly SLACK_ENABLED: boolean;
  readonly SLACK_WEBHOOK_URL: string;
  readonly SLACK_LOG_LEVEL: LogLevel;
  readonly SLACK_BUFFER_SIZE: number;
  readonly SLACK_RETRY_DELAY_SEC: number;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;

  // ───────── FILE SETTINGS ─────────
  readonly LOG_TO_FILE: boolean;
  readonly LOG_FILE_PATH: string;
  readonly FILE_LOG_LEVEL: LogLevel;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Tag names and limits that follow the instrument's publisher, not the operator
 */
export interface DashboardAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── TAG NAMES ─────────
  readonly FAULT_ARRAY_PREFIX: string;
  readonly SYSTEM_FAULT_TAG: string;
  readonly SOURCE_STATUS_TAG: string;
  readonly BEAM_VOLTAGE_TAGS: readonly string[];
  readonly SOURCE_PRESSURE_TAG: string;
  readonly MAGNET_CURRENT_TAG: string;

  // ───────── TRANSPORT CONSTANTS ─────────
  readonly USER_AGENT: string;
  readonly SLACK_MAX_RETRIES: number;
}

/**
 * Complete dashboard configuration
 * Combines user config and app constants
 */
export type DashboardConfig = DashboardUserConfig & DashboardAppConstants;
