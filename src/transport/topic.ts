/**
 * Notification topic transport
 *
 * Polls a ntfy-style topic for its latest message. The response is
 * newline-delimited JSON events; only "message" events carry a payload,
 * as JSON text in their "message" field.
 */

import { isJsonObject } from '@core/snapshot';
import { fetchTextOrNull } from './http';

import type { PayloadUnwrap } from '@core/snapshot';
import type { TopicTransportConfig, Transport, TransportDependencies } from './types';

const MESSAGE_EVENT = 'message';

/**
 * Poll URL for the latest message of a topic
 * @param server - Server base URL (trailing slashes ignored)
 * @param topic - Topic name
 * @returns "<server>/<topic>/json?poll=1&since=latest"
 */
export function topicPollUrl(server: string, topic: string): string {
  return server.replace(/\/+$/, '') + '/' + encodeURIComponent(topic) + '/json?poll=1&since=latest';
}

/**
 * Pick the last message event from an NDJSON body
 *
 * Lines that are blank, not JSON, or not message events (open,
 * keepalive, poll_request) are skipped.
 *
 * @param body - Response body
 * @returns The event line, or null when the body has no message event
 */
export function selectLatestMessage(body: string): string | null {
  const lines = body.split('\n');

  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (line === '') continue;

    let event: unknown;
    try {
      event = JSON.parse(line);
    } catch (_err) {
      continue;
    }

    if (isJsonObject(event) && event.event === MESSAGE_EVENT) {
      return line;
    }
  }

  return null;
}

/**
 * Unwrap step for a topic message event: the message body text
 */
export const unwrapTopicMessage: PayloadUnwrap = function(decoded) {
  return decoded.message;
};

/**
 * Create a topic transport
 * @param config - Server and topic
 * @param deps - Shared transport collaborators
 * @returns Transport returning the latest message event
 */
export function createTopicTransport(config: TopicTransportConfig, deps: TransportDependencies): Transport {
  const url = topicPollUrl(config.server, config.topic);

  async function fetchLatest(): Promise<string | null> {
    const body = await fetchTextOrNull('topic', deps.fetchFn, deps.logger, url, {
      timeoutMs: deps.timeoutMs,
      headers: { 'User-Agent': deps.userAgent }
    });
    if (body === null) return null;

    const latest = selectLatestMessage(body);
    if (latest === null) {
      deps.logger.debug('topic ' + config.topic + ' has no message yet');
    }
    return latest;
  }

  return {
    name: 'topic',
    fetchLatest: fetchLatest,
    unwrap: unwrapTopicMessage
  };
}
