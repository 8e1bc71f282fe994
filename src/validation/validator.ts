/**
 * Dashboard configuration validator
 *
 * Checks USER_CONFIG (after environment overrides) against the critical
 * and recommended ranges documented beside each default in boot/config.ts.
 * Errors stop startup; warnings are printed and startup continues.
 */

import type { DashboardUserConfig, TransportKind } from '$types';
import type { ValidationIssues, ValidationResult } from './types';
import { addError, addWarning, checkHttpUrl, checkNotBlank, checkRange } from './helpers';

const TRANSPORTS: readonly TransportKind[] = ['gist', 'relay', 'topic'];

const TOPIC_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

const LOG_LEVEL_LIMITS = { min: 0, max: 3, integer: true };

/**
 * Validate the source settings for the selected transport
 * @param config - User configuration
 * @param issues - Collector for this pass
 */
function validateSource(config: DashboardUserConfig, issues: ValidationIssues): void {
  if (TRANSPORTS.indexOf(config.TRANSPORT) === -1) {
    addError(issues, 'TRANSPORT', 'TRANSPORT must be one of ' + TRANSPORTS.join(', ') + ' (got ' + config.TRANSPORT + ')');
  }

  if (config.TRANSPORT === 'gist' || config.TRANSPORT === 'relay') {
    checkHttpUrl(config, 'SOURCE_URL', issues);
  }

  if (config.TRANSPORT === 'relay') {
    checkNotBlank(config, 'RELAY_ENVELOPE_FIELD', issues);
  }

  if (config.TRANSPORT === 'topic') {
    checkHttpUrl(config, 'TOPIC_SERVER', issues);
    if (!TOPIC_NAME_PATTERN.test(config.TOPIC_NAME)) {
      addError(issues, 'TOPIC_NAME', 'TOPIC_NAME must be 1-64 letters, digits, "-" or "_" (got \'' + config.TOPIC_NAME + '\')');
    }
  }

  checkRange(config, 'FETCH_TIMEOUT_MS', { min: 500, max: 30000, integer: true, recommended: [2000, 10000] }, issues);
}

/**
 * Validate health tier thresholds and polling cadence
 * @param config - User configuration
 * @param issues - Collector for this pass
 */
function validateTiming(config: DashboardUserConfig, issues: ValidationIssues): void {
  checkRange(config, 'SLOW_THRESHOLD_SEC', { min: 1, max: 86400, recommended: [30, 600] }, issues);
  checkRange(config, 'OFFLINE_THRESHOLD_SEC', { min: 1, max: 604800, recommended: [60, 3600] }, issues);

  if (config.OFFLINE_THRESHOLD_SEC <= config.SLOW_THRESHOLD_SEC) {
    addError(issues, 'OFFLINE_THRESHOLD_SEC', 'OFFLINE_THRESHOLD_SEC must be greater than SLOW_THRESHOLD_SEC');
  }

  checkRange(config, 'POLL_INTERVAL_MS', { min: 1000, max: 600000, integer: true, recommended: [2000, 60000] }, issues);
  checkRange(config, 'OFFLINE_POLL_INTERVAL_MS', { min: 1000, max: 3600000, integer: true }, issues);

  if (config.OFFLINE_POLL_INTERVAL_MS < config.POLL_INTERVAL_MS) {
    addWarning(issues, 'OFFLINE_POLL_INTERVAL_MS', 'OFFLINE_POLL_INTERVAL_MS is shorter than POLL_INTERVAL_MS; an offline source will be polled faster than a live one');
  }

  if (config.POLL_INTERVAL_MS < config.FETCH_TIMEOUT_MS) {
    addWarning(issues, 'POLL_INTERVAL_MS', 'POLL_INTERVAL_MS is shorter than FETCH_TIMEOUT_MS; slow fetches will delay the next poll');
  }
}

/**
 * Validate logger and sink settings
 * @param config - User configuration
 * @param issues - Collector for this pass
 */
function validateLogging(config: DashboardUserConfig, issues: ValidationIssues): void {
  checkRange(config, 'GLOBAL_LOG_LEVEL', LOG_LEVEL_LIMITS, issues);
  checkRange(config, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', { min: 0, max: 720 }, issues);

  checkRange(config, 'CONSOLE_LOG_LEVEL', LOG_LEVEL_LIMITS, issues);
  checkRange(config, 'CONSOLE_BUFFER_SIZE', { min: 10, max: 10000, integer: true }, issues);
  checkRange(config, 'CONSOLE_INTERVAL_MS', { min: 10, max: 5000, integer: true }, issues);

  checkRange(config, 'FILE_LOG_LEVEL', LOG_LEVEL_LIMITS, issues);
  if (config.LOG_TO_FILE) {
    checkNotBlank(config, 'LOG_FILE_PATH', issues);
  }

  checkRange(config, 'SLACK_LOG_LEVEL', LOG_LEVEL_LIMITS, issues);
  checkRange(config, 'SLACK_BUFFER_SIZE', { min: 1, max: 100, integer: true }, issues);
  checkRange(config, 'SLACK_RETRY_DELAY_SEC', { min: 1, max: 600 }, issues);
  if (config.SLACK_ENABLED) {
    checkHttpUrl(config, 'SLACK_WEBHOOK_URL', issues);
    if (config.SLACK_LOG_LEVEL < 2) {
      addWarning(issues, 'SLACK_LOG_LEVEL', 'SLACK_LOG_LEVEL below WARNING will post every poll outcome to Slack');
    }
  }

  if (!config.CONSOLE_ENABLED && !config.LOG_TO_FILE && !config.SLACK_ENABLED) {
    addWarning(issues, 'CONSOLE_ENABLED', 'All log sinks are disabled');
  }
}

/**
 * Validate the dashboard user configuration
 * @param config - User configuration (defaults merged with environment)
 * @returns Validation result with errors and warnings
 */
export function validateConfig(config: DashboardUserConfig): ValidationResult {
  const issues: ValidationIssues = { errors: [], warnings: [] };

  validateSource(config, issues);
  validateTiming(config, issues);
  checkRange(config, 'FAULT_ARRAY_SIZE', { min: 1, max: 1024, integer: true }, issues);
  validateLogging(config, issues);

  return {
    valid: issues.errors.length === 0,
    errors: issues.errors,
    warnings: issues.warnings
  };
}
