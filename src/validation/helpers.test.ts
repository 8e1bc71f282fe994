/**
 * Unit tests for validation helper functions
 */

import { addError, addWarning, checkHttpUrl, checkNotBlank, checkRange } from './helpers';
import { USER_CONFIG } from '../boot/config';
import type { DashboardUserConfig } from '../types';
import type { ValidationIssues } from './types';

function emptyIssues(): ValidationIssues {
  return { errors: [], warnings: [] };
}

function withSettings(overrides: Partial<DashboardUserConfig>): DashboardUserConfig {
  return { ...USER_CONFIG, ...overrides };
}

function messages(list: Array<{ message: string }>): string[] {
  return list.map(function(e) { return e.message; });
}

describe('Validation Helpers', () => {
  // ═══════════════════════════════════════════════════════════════
  // addError() / addWarning()
  // ═══════════════════════════════════════════════════════════════

  describe('addError', () => {
    it('should add error with CRITICAL level, field and message', () => {
      const issues = emptyIssues();

      addError(issues, 'FETCH_TIMEOUT_MS', 'Value out of range');

      expect(issues.errors).toEqual([
        { level: 'CRITICAL', field: 'FETCH_TIMEOUT_MS', message: 'Value out of range' }
      ]);
      expect(issues.warnings).toHaveLength(0);
    });

    it('should accumulate multiple errors in order', () => {
      const issues = emptyIssues();

      addError(issues, 'SOURCE_URL', 'Error 1');
      addError(issues, 'TOPIC_NAME', 'Error 2');

      expect(issues.errors.map(function(e) { return e.field; })).toEqual(['SOURCE_URL', 'TOPIC_NAME']);
    });
  });

  describe('addWarning', () => {
    it('should add warning with WARNING level', () => {
      const issues = emptyIssues();

      addWarning(issues, 'POLL_INTERVAL_MS', 'Very short');

      expect(issues.warnings).toEqual([
        { level: 'WARNING', field: 'POLL_INTERVAL_MS', message: 'Very short' }
      ]);
      expect(issues.errors).toHaveLength(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // checkRange()
  // ═══════════════════════════════════════════════════════════════

  describe('checkRange', () => {
    it('should accept both boundaries', () => {
      const issues = emptyIssues();

      checkRange(withSettings({ SLACK_RETRY_DELAY_SEC: 1 }), 'SLACK_RETRY_DELAY_SEC', { min: 1, max: 600 }, issues);
      checkRange(withSettings({ SLACK_RETRY_DELAY_SEC: 600 }), 'SLACK_RETRY_DELAY_SEC', { min: 1, max: 600 }, issues);

      expect(issues.errors).toHaveLength(0);
    });

    it('should add error outside the hard limits', () => {
      const issues = emptyIssues();

      checkRange(withSettings({ SLOW_THRESHOLD_SEC: 0.5 }), 'SLOW_THRESHOLD_SEC', { min: 1, max: 86400 }, issues);

      expect(issues.errors).toEqual([{
        level: 'CRITICAL',
        field: 'SLOW_THRESHOLD_SEC',
        message: 'SLOW_THRESHOLD_SEC must be between 1 and 86400 (got 0.5)'
      }]);
    });

    it('should add warning outside the recommended band only', () => {
      const issues = emptyIssues();

      checkRange(
        withSettings({ SLOW_THRESHOLD_SEC: 600 }),
        'SLOW_THRESHOLD_SEC',
        { min: 1, max: 86400, recommended: [30, 300] },
        issues
      );

      expect(issues.errors).toHaveLength(0);
      expect(messages(issues.warnings)).toEqual(['SLOW_THRESHOLD_SEC is outside recommended range 30-300 (got 600)']);
    });

    it('should skip the recommended band when the hard limits fail', () => {
      const issues = emptyIssues();

      checkRange(
        withSettings({ GLOBAL_LOG_AUTO_DEMOTE_HOURS: -5 }),
        'GLOBAL_LOG_AUTO_DEMOTE_HOURS',
        { min: 0, max: 10, recommended: [2, 8] },
        issues
      );

      expect(issues.errors).toHaveLength(1);
      expect(issues.warnings).toHaveLength(0);
    });

    it('should reject unreadable numbers', () => {
      const issues = emptyIssues();

      checkRange(withSettings({ SLOW_THRESHOLD_SEC: NaN }), 'SLOW_THRESHOLD_SEC', { min: 1, max: 10 }, issues);
      checkRange(withSettings({ SLOW_THRESHOLD_SEC: Infinity }), 'SLOW_THRESHOLD_SEC', { min: 1, max: 10 }, issues);

      expect(messages(issues.errors)).toEqual([
        'SLOW_THRESHOLD_SEC must be between 1 and 10 (got NaN)',
        'SLOW_THRESHOLD_SEC must be between 1 and 10 (got Infinity)'
      ]);
    });

    it('should reject fractions before checking the limits of an integer setting', () => {
      const issues = emptyIssues();

      checkRange(withSettings({ FAULT_ARRAY_SIZE: 99.5 }), 'FAULT_ARRAY_SIZE', { min: 1, max: 1024, integer: true }, issues);
      checkRange(withSettings({ FAULT_ARRAY_SIZE: NaN }), 'FAULT_ARRAY_SIZE', { min: 1, max: 1024, integer: true }, issues);

      expect(messages(issues.errors)).toEqual([
        'FAULT_ARRAY_SIZE must be an integer (got 99.5)',
        'FAULT_ARRAY_SIZE must be an integer (got NaN)'
      ]);
    });

    it('should check the limits of an integer setting', () => {
      const issues = emptyIssues();

      checkRange(withSettings({ FAULT_ARRAY_SIZE: 2048 }), 'FAULT_ARRAY_SIZE', { min: 1, max: 1024, integer: true }, issues);
      checkRange(withSettings({ FAULT_ARRAY_SIZE: 99 }), 'FAULT_ARRAY_SIZE', { min: 1, max: 1024, integer: true }, issues);

      expect(messages(issues.errors)).toEqual(['FAULT_ARRAY_SIZE must be between 1 and 1024 (got 2048)']);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Text settings
  // ═══════════════════════════════════════════════════════════════

  describe('checkNotBlank', () => {
    it('should reject blank text', () => {
      const issues = emptyIssues();

      checkNotBlank(withSettings({ RELAY_ENVELOPE_FIELD: '   ' }), 'RELAY_ENVELOPE_FIELD', issues);
      checkNotBlank(withSettings({ RELAY_ENVELOPE_FIELD: 'message' }), 'RELAY_ENVELOPE_FIELD', issues);

      expect(issues.errors).toEqual([
        { level: 'CRITICAL', field: 'RELAY_ENVELOPE_FIELD', message: 'RELAY_ENVELOPE_FIELD must not be empty' }
      ]);
    });
  });

  describe('checkHttpUrl', () => {
    it('should accept http and https URLs', () => {
      const issues = emptyIssues();

      checkHttpUrl(withSettings({ SOURCE_URL: 'https://example.test/raw/status.json' }), 'SOURCE_URL', issues);
      checkHttpUrl(withSettings({ SOURCE_URL: 'http://localhost:8080/latest' }), 'SOURCE_URL', issues);

      expect(issues.errors).toHaveLength(0);
    });

    it('should reject relative, empty and non-http URLs', () => {
      const issues = emptyIssues();

      checkHttpUrl(withSettings({ SOURCE_URL: '' }), 'SOURCE_URL', issues);
      checkHttpUrl(withSettings({ SOURCE_URL: '/raw/status.json' }), 'SOURCE_URL', issues);
      checkHttpUrl(withSettings({ SOURCE_URL: 'ftp://example.test/x' }), 'SOURCE_URL', issues);

      expect(messages(issues.errors)).toEqual([
        "SOURCE_URL must be an http(s) URL (got '')",
        "SOURCE_URL must be an http(s) URL (got '/raw/status.json')",
        "SOURCE_URL must be an http(s) URL (got 'ftp://example.test/x')"
      ]);
    });
  });
});
