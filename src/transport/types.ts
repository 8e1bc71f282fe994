/**
 * Transport type definitions
 */

import type { PayloadUnwrap } from '@core/snapshot';
import type { Logger } from '@logging';
import type { Clock, FetchFn } from '$types';

/**
 * Delivery channel for instrument snapshots
 *
 * fetchLatest resolves with the newest raw payload text, or null when
 * nothing is available this cycle (timeout, network or HTTP failure, no
 * message yet). It never rejects for transport failures.
 */
export interface Transport {
  /** Short name used in log lines */
  readonly name: string;
  /** Fetch the newest raw payload */
  fetchLatest(): Promise<string | null>;
  /** Extract the instrument payload from the channel's wrapper */
  readonly unwrap?: PayloadUnwrap;
}

/**
 * Options for one HTTP GET
 */
export interface FetchTextOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs: number;
  /** Extra request headers */
  headers?: Record<string, string>;
}

/**
 * Collaborators shared by every transport
 */
export interface TransportDependencies {
  fetchFn: FetchFn;
  logger: Logger;
  clock: Clock;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** User-Agent header value */
  userAgent: string;
}

export interface GistTransportConfig {
  /** Raw file URL */
  url: string;
}

export interface RelayTransportConfig {
  /** Latest-message endpoint URL */
  url: string;
  /** Envelope field holding the snapshot */
  envelopeField: string;
}

export interface TopicTransportConfig {
  /** Notification server base URL */
  server: string;
  /** Topic name */
  topic: string;
}
