/**
 * Slack webhook output sink with buffering and retry
 *
 * Sends log messages to Slack via an incoming webhook for remote monitoring.
 * Features:
 * - Webhook URL taken from configuration (SLACK_WEBHOOK_URL)
 * - Buffers failed messages for retry
 * - Exponential backoff retry (5s, 10s, 20s... capped at 60s)
 * - Drops oldest messages when buffer full
 * - Each POST is aborted after timeoutMs and counts as a failure
 * - Slack failures are reported on the console and never reach the caller
 */

import type { FetchFn, TimerAPI } from '$types';
import type { SlackSink, SlackSinkConfig } from '../types';

/**
 * Longest delay between retries
 */
const MAX_RETRY_DELAY_MS = 60000;

const DEFAULT_SEND_TIMEOUT_MS = 10000;

/**
 * Message in the retry buffer
 */
interface BufferedMessage {
  text: string;
  retries: number;
}

/**
 * Validate the configured webhook URL
 * @param config - Slack configuration
 * @returns Trimmed http(s) URL, or null when missing or not a URL
 */
export function resolveWebhookUrl(config: SlackSinkConfig): string | null {
  const url = config.webhookUrl.trim();
  if (!url) return null;
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') return null;
  } catch (_err) {
    return null;
  }
  return url;
}

/**
 * Create a Slack sink with buffering and retry
 *
 * Failed messages are buffered and retried with exponential backoff.
 * The sink must be initialized before use to resolve the webhook URL.
 *
 * @param fetchFn - Fetch implementation used to POST to the webhook
 * @param timerApi - Timer API for retry scheduling
 * @param config - Slack sink configuration
 * @returns Slack sink instance
 *
 * @example
 * ```typescript
 * const slackSink = createSlackSink(fetch, createNodeTimer(), {
 *   enabled: true,
 *   webhookUrl: process.env.SLACK_WEBHOOK_URL || '',
 *   bufferSize: 10,
 *   retryDelayMs: 5000,
 *   maxRetries: 5,
 *   timeoutMs: 5000
 * });
 * ```
 */
export function createSlackSink(
  fetchFn: FetchFn,
  timerApi: TimerAPI,
  config: SlackSinkConfig
): SlackSink {
  let webhookUrl: string | null = null;
  let initialized = false;
  const buffer: BufferedMessage[] = [];
  let retryTimerActive = false;
  let currentRetryDelay = config.retryDelayMs;

  /**
   * Send a message to Slack
   * @param message - Message to send
   * @param onSuccess - Called on success
   * @param onFailure - Called on failure
   */
  function sendToSlack(
    message: BufferedMessage,
    onSuccess: () => void,
    onFailure: () => void
  ): void {
    if (!webhookUrl) {
      onFailure();
      return;
    }

    const timeoutMs = config.timeoutMs || DEFAULT_SEND_TIMEOUT_MS;
    const controller = new AbortController();
    let settled = false;

    // Exactly one of onSuccess/onFailure runs, even if fetch ignores the abort
    function settle(ok: boolean): void {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      if (ok) {
        onSuccess();
      } else {
        onFailure();
      }
    }

    const timeoutId = setTimeout(function() {
      controller.abort();
      console.warn('Slack send timed out after ' + timeoutMs + 'ms');
      settle(false);
    }, timeoutMs);

    void fetchFn(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: message.text }),
      signal: controller.signal
    }).then(
      function(response: Response) {
        if (response.ok) {
          settle(true);
        } else {
          console.warn('Slack send failed: HTTP ' + response.status);
          settle(false);
        }
      },
      function(err: unknown) {
        if (!settled) {
          console.warn('Slack send exception: ' + String(err));
        }
        settle(false);
      }
    );
  }

  function scheduleRetry(): void {
    timerApi.set(currentRetryDelay, false, processBuffer);
  }

  /**
   * Process the retry buffer
   * Attempts to send the first message, schedules retry on failure
   */
  function processBuffer(): void {
    if (buffer.length === 0) {
      retryTimerActive = false;
      currentRetryDelay = config.retryDelayMs;
      return;
    }

    const message = buffer[0];

    sendToSlack(
      message,
      function onSuccess() {
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;

        if (buffer.length > 0) {
          processBuffer();
        } else {
          retryTimerActive = false;
        }
      },
      function onFailure() {
        message.retries++;

        if (message.retries >= config.maxRetries) {
          console.warn('Slack message dropped after ' + config.maxRetries + ' retries');
          buffer.shift();
          currentRetryDelay = config.retryDelayMs;
        } else {
          currentRetryDelay = Math.min(currentRetryDelay * 2, MAX_RETRY_DELAY_MS);
        }

        if (buffer.length > 0) {
          scheduleRetry();
        } else {
          retryTimerActive = false;
        }
      }
    );
  }

  /**
   * Initialize the sink by resolving the webhook URL
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    initialized = true;
    if (!config.enabled) {
      callback(true, 'Slack disabled');
      return;
    }

    webhookUrl = resolveWebhookUrl(config);
    if (webhookUrl) {
      callback(true, 'Slack webhook configured');
    } else {
      callback(false, 'Slack enabled but no webhook URL configured');
    }
  }

  /**
   * Write formatted message to Slack
   * Messages are sent immediately if possible, or buffered for retry
   * @param formattedMessage - Pre-formatted log message (already filtered by level)
   */
  function write(formattedMessage: string): void {
    if (!config.enabled || !webhookUrl) {
      return;
    }

    const message: BufferedMessage = {
      text: formattedMessage,
      retries: 0
    };

    sendToSlack(
      message,
      function onSuccess() {
        // Sent
      },
      function onFailure() {
        if (buffer.length >= config.bufferSize) {
          const dropped = buffer.shift();
          console.warn('Slack buffer full, dropping oldest message: ' + (dropped ? dropped.text.substring(0, 50) : ''));
        }
        buffer.push(message);

        if (!retryTimerActive) {
          retryTimerActive = true;
          scheduleRetry();
        }
      }
    );
  }

  function isInitialized(): boolean {
    return initialized;
  }

  /**
   * Get current buffer size (for testing/monitoring)
   * @returns Number of messages in retry buffer
   */
  function getBufferSize(): number {
    return buffer.length;
  }

  return {
    write: write,
    initialize: initialize,
    isInitialized: isInitialized,
    getBufferSize: getBufferSize
  };
}
