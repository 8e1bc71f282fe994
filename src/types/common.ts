/**
 * Common type definitions used throughout the project
 */

/**
 * Scalar value carried by a single telemetry tag
 */
export type TagValue = number | boolean | string;

/**
 * Flat tag namespace of one snapshot
 * Keys are opaque dotted strings (e.g. "system.general.systemFault"), never traversed
 */
export type TagMap = ReadonlyMap<string, TagValue>;

/**
 * Seconds since the Unix epoch (may be fractional)
 */
export type EpochSeconds = number;

/**
 * Clock returning the current time in seconds since the epoch
 */
export type Clock = () => EpochSeconds;

type JsonPrimitive = string | number | boolean | null;
type JsonArray = JsonValue[];
export interface JsonObject { [key: string]: JsonValue }

/** Any JSON-compatible value as produced by JSON.parse */
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;
