/**
 * Snapshot parsing
 * Turns one raw transport payload into a validated, immutable Snapshot
 */

import { resolveTimestamp } from '@core/timestamp';
import { EmptyPayloadError, MalformedPayloadError } from '$types/errors';

import type { JsonObject, JsonValue } from '$types/common';
import type { ParseResult, PayloadShape, PayloadUnwrap, RawPayload, Snapshot } from './types';
import {
  collectTags,
  ENVELOPE_DATA_KEY,
  hasOwn,
  isJsonObject,
  isWaitingPlaceholder,
  preview,
  TIMESTAMP_KEY
} from './helpers';

const UTF8 = new TextDecoder('utf-8', { fatal: true });

type DecodeResult =
  | { ok: true; value: JsonObject }
  | { ok: false; error: EmptyPayloadError | MalformedPayloadError };

/**
 * Decode text or bytes into a JSON object
 * @param payload - Raw payload or already-decoded value
 * @param what - Label used in error messages
 * @returns Decoded object or a parse failure
 */
function decodeObject(payload: unknown, what: string): DecodeResult {
  if (payload === null || payload === undefined) {
    return { ok: false, error: new EmptyPayloadError('No ' + what + ' available') };
  }

  let value: unknown = payload;

  if (payload instanceof Uint8Array) {
    try {
      value = UTF8.decode(payload);
    } catch (_err) {
      return { ok: false, error: new MalformedPayloadError(what + ' is not valid UTF-8') };
    }
  }

  if (typeof value === 'string') {
    const text = value;
    if (text.trim() === '') {
      return { ok: false, error: new EmptyPayloadError('Empty ' + what) };
    }
    try {
      value = JSON.parse(text);
    } catch (_err) {
      return { ok: false, error: new MalformedPayloadError(what + ' is not valid JSON: ' + preview(text)) };
    }
  }

  if (!isJsonObject(value)) {
    const kind = Array.isArray(value) ? 'array' : typeof value;
    return { ok: false, error: new MalformedPayloadError(what + ' must be a JSON object, got ' + kind) };
  }

  return { ok: true, value: value };
}

/**
 * Parse one transport payload into a Snapshot
 *
 * Steps:
 * 1. Decode text/bytes as JSON (empty → EmptyPayload, invalid → MalformedPayload)
 * 2. Apply the transport unwrap step, if any, and decode its result the same way
 * 3. Treat the publisher's { "status": "waiting" } placeholder as EmptyPayload
 * 4. Detect the layout by an own "data" key (enveloped) or take the whole object (flat)
 * 5. Resolve the timestamp (top-level, then data.timestamp for envelopes)
 *
 * @param payload - Raw payload from a transport
 * @param unwrap - Optional transport-specific unwrap step
 * @returns Snapshot on success, EmptyPayloadError or MalformedPayloadError otherwise
 */
export function parseSnapshot(payload: RawPayload, unwrap?: PayloadUnwrap): ParseResult {
  const outer = decodeObject(payload, 'payload');
  if (!outer.ok) return outer;

  let decoded = outer.value;

  if (unwrap) {
    let inner: unknown;
    try {
      inner = unwrap(decoded);
    } catch (err) {
      return { ok: false, error: new MalformedPayloadError('Unwrap failed: ' + String(err)) };
    }
    const unwrapped = decodeObject(inner, 'unwrapped payload');
    if (!unwrapped.ok) return unwrapped;
    decoded = unwrapped.value;
  }

  if (isWaitingPlaceholder(decoded)) {
    return { ok: false, error: new EmptyPayloadError('Publisher is waiting for the instrument') };
  }

  let tagSource: JsonObject = decoded;
  let rawTimestamp: JsonValue | undefined = hasOwn(decoded, TIMESTAMP_KEY) ? decoded[TIMESTAMP_KEY] : undefined;
  const enveloped = hasOwn(decoded, ENVELOPE_DATA_KEY);

  if (enveloped) {
    const data = decoded[ENVELOPE_DATA_KEY];
    if (!isJsonObject(data)) {
      return { ok: false, error: new MalformedPayloadError('"data" must be a JSON object') };
    }
    tagSource = data;
    if (rawTimestamp === undefined && hasOwn(data, TIMESTAMP_KEY)) {
      rawTimestamp = data[TIMESTAMP_KEY];
    }
  }

  const shape: PayloadShape = enveloped ? 'enveloped' : 'flat';
  const snapshot: Snapshot = Object.freeze({
    rawTimestamp: rawTimestamp,
    resolvedInstant: resolveTimestamp(rawTimestamp),
    tags: collectTags(tagSource),
    shape: shape
  });

  return { ok: true, snapshot: snapshot };
}
