/**
 * Snapshot parser type definitions
 */

import type { JsonObject, JsonValue, TagMap } from '$types/common';
import type { EmptyPayloadError, MalformedPayloadError } from '$types/errors';

/**
 * Inbound payload layout
 * - flat: tags and "timestamp" side by side at the top level
 * - enveloped: tags wrapped under a "data" key
 */
export type PayloadShape = 'flat' | 'enveloped';

/**
 * One parsed point-in-time reading from the instrument
 *
 * Constructed once per successful parse and frozen; never mutated.
 */
export interface Snapshot {
  /** Timestamp as delivered, undefined when the payload had none */
  readonly rawTimestamp: JsonValue | undefined;

  /** Seconds since epoch, null when the timestamp could not be resolved */
  readonly resolvedInstant: number | null;

  /** Scalar tags keyed by opaque dotted string */
  readonly tags: TagMap;

  /** Which inbound layout was detected */
  readonly shape: PayloadShape;
}

/**
 * Raw transport payload
 * Text or bytes are decoded as JSON; anything else is taken as already decoded
 */
export type RawPayload = string | Uint8Array | JsonValue | null | undefined;

/**
 * Transport-specific step that extracts the instrument payload from a wrapper
 * (pub/sub envelope, notification message). May return JSON text.
 */
export type PayloadUnwrap = (decoded: JsonObject) => unknown;

/**
 * Outcome of parsing one payload; failures are values, never thrown
 */
export type ParseResult =
  | { ok: true; snapshot: Snapshot }
  | { ok: false; error: EmptyPayloadError | MalformedPayloadError };
