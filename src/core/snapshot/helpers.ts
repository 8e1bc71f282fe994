/**
 * Snapshot parser helper functions
 */

import type { JsonObject, JsonValue, TagValue } from '$types/common';

/** Key holding the snapshot timestamp in either layout */
export const TIMESTAMP_KEY = 'timestamp';

/** Key wrapping the tags in the enveloped layout */
export const ENVELOPE_DATA_KEY = 'data';

/**
 * Check for a plain JSON object (not null, not an array)
 * @param value - Value to check
 * @returns True when value is a JSON object
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

/**
 * Own-property check that ignores the prototype chain
 * @param obj - Object to inspect
 * @param key - Property name
 * @returns True when obj has key as its own property
 */
export function hasOwn(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/**
 * Check for a scalar tag value
 * @param value - JSON value
 * @returns True for numbers, booleans and strings
 */
export function isTagValue(value: JsonValue | undefined): value is TagValue {
  return typeof value === 'number' || typeof value === 'boolean' || typeof value === 'string';
}

/**
 * Collect scalar tags from a flat key/value object
 *
 * The timestamp key is not a tag; nested objects, arrays and null are dropped.
 *
 * @param source - Object whose own keys are tag names
 * @returns Tag map
 */
export function collectTags(source: JsonObject): Map<string, TagValue> {
  const tags = new Map<string, TagValue>();
  const keys = Object.keys(source);

  for (let i = 0; i < keys.length; i++) {
    const value = source[keys[i]];
    if (keys[i] !== TIMESTAMP_KEY && isTagValue(value)) {
      tags.set(keys[i], value);
    }
  }

  return tags;
}

/**
 * Whether a decoded payload is the publisher's "waiting" placeholder
 * @param decoded - Decoded payload
 * @returns True for { "status": "waiting", ... }
 */
export function isWaitingPlaceholder(decoded: JsonObject): boolean {
  return decoded.status === 'waiting';
}

/**
 * Truncate text for inclusion in an error message
 * @param text - Text to shorten
 * @param max - Maximum characters kept
 * @returns Text, with an ellipsis when shortened
 */
export function preview(text: string, max = 40): string {
  return text.length > max ? text.slice(0, max) + '…' : text;
}
