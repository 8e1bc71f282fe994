/**
 * Validation helper functions
 * Each check reads its setting straight from the user config by name
 */

import type { DashboardUserConfig } from '$types';
import type { ConfigField, NumericField, NumericLimits, TextField, ValidationIssues } from './types';
import { isFiniteNumber, isInteger } from '@utils/number';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Record a problem that stops startup
 * @param issues - Collector for this pass
 * @param field - Setting that failed
 * @param message - Text shown to the operator
 */
export function addError(issues: ValidationIssues, field: ConfigField, message: string): void {
  issues.errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Record a problem that is printed but lets startup continue
 * @param issues - Collector for this pass
 * @param field - Setting with a questionable value
 * @param message - Text shown to the operator
 */
export function addWarning(issues: ValidationIssues, field: ConfigField, message: string): void {
  issues.warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// SETTING CHECKS
// ═══════════════════════════════════════════════════════════════

/**
 * Check a numeric setting against its hard limits, then its recommended band
 *
 * NaN and Infinity (unreadable environment values) fail the hard limits.
 * The recommended band is only consulted once the hard limits pass.
 *
 * @param config - User configuration
 * @param field - Numeric setting to check
 * @param limits - Hard limits, integer flag and optional recommended band
 * @param issues - Collector for this pass
 */
export function checkRange(
  config: DashboardUserConfig,
  field: NumericField,
  limits: NumericLimits,
  issues: ValidationIssues
): void {
  const value = config[field];

  if (limits.integer && !isInteger(value)) {
    addError(issues, field, `${field} must be an integer (got ${value})`);
    return;
  }

  if (!isFiniteNumber(value) || value < limits.min || value > limits.max) {
    addError(issues, field, `${field} must be between ${limits.min} and ${limits.max} (got ${value})`);
    return;
  }

  const band = limits.recommended;
  if (band && (value < band[0] || value > band[1])) {
    addWarning(issues, field, `${field} is outside recommended range ${band[0]}-${band[1]} (got ${value})`);
  }
}

/**
 * Check that a text setting is not blank
 */
export function checkNotBlank(config: DashboardUserConfig, field: TextField, issues: ValidationIssues): void {
  if (config[field].trim() === '') {
    addError(issues, field, `${field} must not be empty`);
  }
}

/**
 * Check that a text setting is an absolute http(s) URL
 * @param config - User configuration
 * @param field - URL setting to check
 * @param issues - Collector for this pass
 */
export function checkHttpUrl(config: DashboardUserConfig, field: TextField, issues: ValidationIssues): void {
  const value = config[field];
  let protocol = '';
  try {
    protocol = new URL(value).protocol;
  } catch (_err) {
    protocol = '';
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    addError(issues, field, `${field} must be an http(s) URL (got '${value}')`);
  }
}
