/**
 * Tests for configuration validator
 */

import { validateConfig } from './validator';
import { USER_CONFIG } from '../boot/config';
import type { DashboardUserConfig } from '../types';

// Valid base configuration for testing
const validConfig: DashboardUserConfig = {
  ...USER_CONFIG,
  SOURCE_URL: 'https://gist.example.test/raw/status.json'
};

function fields(list: Array<{ field: string }>): string[] {
  return list.map(function(e) { return e.field; });
}

describe('validateConfig', () => {
  describe('valid configuration', () => {
    it('should return valid with no warnings for the defaults plus a source URL', () => {
      const result = validateConfig(validConfig);
      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
      expect(result.warnings).toHaveLength(0);
    });

    it('should reject the shipped defaults because no source is configured', () => {
      const result = validateConfig(USER_CONFIG);
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([{
        level: 'CRITICAL',
        field: 'SOURCE_URL',
        message: "SOURCE_URL must be an http(s) URL (got '')"
      }]);
    });
  });

  describe('source validation', () => {
    it('should error on an unknown transport', () => {
      const config = Object.assign({}, validConfig, { TRANSPORT: 'mqtt' });
      const result = validateConfig(config);
      expect(result.errors[0].message).toBe('TRANSPORT must be one of gist, relay, topic (got mqtt)');
    });

    it('should require an envelope field for the relay transport', () => {
      const config: DashboardUserConfig = { ...validConfig, TRANSPORT: 'relay', RELAY_ENVELOPE_FIELD: ' ' };
      const result = validateConfig(config);
      expect(fields(result.errors)).toEqual(['RELAY_ENVELOPE_FIELD']);
    });

    it('should ignore SOURCE_URL for the topic transport', () => {
      const config: DashboardUserConfig = {
        ...validConfig,
        TRANSPORT: 'topic',
        SOURCE_URL: '',
        TOPIC_NAME: 'beamline-7_status'
      };
      const result = validateConfig(config);
      expect(result.valid).toBe(true);
    });

    it('should error on an invalid topic name', () => {
      const config: DashboardUserConfig = { ...validConfig, TRANSPORT: 'topic', TOPIC_NAME: 'has space' };
      const result = validateConfig(config);
      expect(result.errors).toEqual([{
        level: 'CRITICAL',
        field: 'TOPIC_NAME',
        message: 'TOPIC_NAME must be 1-64 letters, digits, "-" or "_" (got \'has space\')'
      }]);
    });

    it('should error on a topic name longer than 64 characters', () => {
      const config: DashboardUserConfig = { ...validConfig, TRANSPORT: 'topic', TOPIC_NAME: 'a'.repeat(65) };
      const result = validateConfig(config);
      expect(fields(result.errors)).toEqual(['TOPIC_NAME']);
    });

    it('should error on a non-http topic server', () => {
      const config: DashboardUserConfig = {
        ...validConfig,
        TRANSPORT: 'topic',
        TOPIC_NAME: 'status',
        TOPIC_SERVER: 'ntfy.sh'
      };
      const result = validateConfig(config);
      expect(fields(result.errors)).toEqual(['TOPIC_SERVER']);
    });

    it('should bound FETCH_TIMEOUT_MS and warn outside the recommended range', () => {
      expect(fields(validateConfig({ ...validConfig, FETCH_TIMEOUT_MS: 100 }).errors)).toEqual(['FETCH_TIMEOUT_MS']);

      const result = validateConfig({ ...validConfig, FETCH_TIMEOUT_MS: 1000 });
      expect(result.valid).toBe(true);
      expect(result.warnings[0].message).toBe('FETCH_TIMEOUT_MS is outside recommended range 2000-10000 (got 1000)');
    });
  });

  describe('timing validation', () => {
    it('should error when OFFLINE_THRESHOLD_SEC does not exceed SLOW_THRESHOLD_SEC', () => {
      const result = validateConfig({ ...validConfig, SLOW_THRESHOLD_SEC: 300, OFFLINE_THRESHOLD_SEC: 300 });
      expect(result.errors).toEqual([{
        level: 'CRITICAL',
        field: 'OFFLINE_THRESHOLD_SEC',
        message: 'OFFLINE_THRESHOLD_SEC must be greater than SLOW_THRESHOLD_SEC'
      }]);
    });

    it('should error when SLOW_THRESHOLD_SEC is below 1', () => {
      const result = validateConfig({ ...validConfig, SLOW_THRESHOLD_SEC: 0 });
      expect(fields(result.errors)).toEqual(['SLOW_THRESHOLD_SEC']);
    });

    it('should error on a fractional POLL_INTERVAL_MS', () => {
      const result = validateConfig({ ...validConfig, POLL_INTERVAL_MS: 5000.5 });
      expect(result.errors[0].message).toBe('POLL_INTERVAL_MS must be an integer (got 5000.5)');
    });

    it('should warn when the offline interval is shorter than the live one', () => {
      const result = validateConfig({ ...validConfig, OFFLINE_POLL_INTERVAL_MS: 2000 });
      expect(result.valid).toBe(true);
      expect(fields(result.warnings)).toEqual(['OFFLINE_POLL_INTERVAL_MS']);
    });

    it('should warn when polling faster than the fetch timeout', () => {
      const result = validateConfig({ ...validConfig, POLL_INTERVAL_MS: 3000, FETCH_TIMEOUT_MS: 8000 });
      expect(fields(result.warnings)).toEqual(['POLL_INTERVAL_MS']);
    });
  });

  describe('fault validation', () => {
    it('should bound FAULT_ARRAY_SIZE', () => {
      expect(validateConfig({ ...validConfig, FAULT_ARRAY_SIZE: 0 }).valid).toBe(false);
      expect(validateConfig({ ...validConfig, FAULT_ARRAY_SIZE: 1025 }).valid).toBe(false);
      expect(validateConfig({ ...validConfig, FAULT_ARRAY_SIZE: 1024 }).valid).toBe(true);
    });
  });

  describe('logging validation', () => {
    it('should require a webhook URL when Slack is enabled', () => {
      const result = validateConfig({ ...validConfig, SLACK_ENABLED: true });
      expect(fields(result.errors)).toEqual(['SLACK_WEBHOOK_URL']);
    });

    it('should warn when Slack receives INFO messages', () => {
      const result = validateConfig({
        ...validConfig,
        SLACK_ENABLED: true,
        SLACK_WEBHOOK_URL: 'https://hooks.example.test/services/test-secret',
        SLACK_LOG_LEVEL: 1
      });
      expect(result.valid).toBe(true);
      expect(fields(result.warnings)).toEqual(['SLACK_LOG_LEVEL']);
    });

    it('should require a log file path when file logging is on', () => {
      const result = validateConfig({ ...validConfig, LOG_TO_FILE: true, LOG_FILE_PATH: '' });
      expect(result.errors[0].message).toBe('LOG_FILE_PATH must not be empty');
    });

    it('should warn when every sink is disabled', () => {
      const result = validateConfig({ ...validConfig, CONSOLE_ENABLED: false });
      expect(result.warnings).toEqual([{
        level: 'WARNING',
        field: 'CONSOLE_ENABLED',
        message: 'All log sinks are disabled'
      }]);
    });

    it('should bound the console buffer and drain interval', () => {
      const result = validateConfig({ ...validConfig, CONSOLE_BUFFER_SIZE: 5, CONSOLE_INTERVAL_MS: 6000 });
      expect(fields(result.errors)).toEqual(['CONSOLE_BUFFER_SIZE', 'CONSOLE_INTERVAL_MS']);
    });

    it('should bound GLOBAL_LOG_AUTO_DEMOTE_HOURS', () => {
      expect(validateConfig({ ...validConfig, GLOBAL_LOG_AUTO_DEMOTE_HOURS: 0 }).valid).toBe(true);
      expect(validateConfig({ ...validConfig, GLOBAL_LOG_AUTO_DEMOTE_HOURS: 721 }).valid).toBe(false);
    });

    it('should bound SLACK_RETRY_DELAY_SEC', () => {
      const result = validateConfig({ ...validConfig, SLACK_RETRY_DELAY_SEC: 0 });
      expect(result.errors[0].message).toBe('SLACK_RETRY_DELAY_SEC must be between 1 and 600 (got 0)');
    });
  });
});
