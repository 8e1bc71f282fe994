/**
 * Snapshot transports
 *
 * - gist: raw file polled with cache busting
 * - relay: latest-message endpoint returning an envelope
 * - topic: notification topic polled for its latest message
 */

import { createGistTransport } from './gist';
import { createRelayTransport } from './relay';
import { createTopicTransport } from './topic';

import type { DashboardConfig } from '$types';
import type { Transport, TransportDependencies } from './types';

export { fetchText, fetchTextOrNull } from './http';
export { createGistTransport, cacheBustedUrl } from './gist';
export { createRelayTransport, createEnvelopeUnwrap } from './relay';
export { createTopicTransport, selectLatestMessage, topicPollUrl, unwrapTopicMessage } from './topic';
export type {
  Transport,
  TransportDependencies,
  FetchTextOptions,
  GistTransportConfig,
  RelayTransportConfig,
  TopicTransportConfig
} from './types';

/**
 * Create the transport selected by configuration
 * @param config - Dashboard configuration
 * @param deps - Shared transport collaborators
 * @returns Configured transport
 */
export function createTransport(config: DashboardConfig, deps: TransportDependencies): Transport {
  switch (config.TRANSPORT) {
    case 'relay':
      return createRelayTransport({ url: config.SOURCE_URL, envelopeField: config.RELAY_ENVELOPE_FIELD }, deps);
    case 'topic':
      return createTopicTransport({ server: config.TOPIC_SERVER, topic: config.TOPIC_NAME }, deps);
    case 'gist':
      return createGistTransport({ url: config.SOURCE_URL }, deps);
  }
}
