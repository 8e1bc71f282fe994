/**
 * Timestamp resolver type definitions
 */

/**
 * A snapshot timestamp classified by representation
 *
 * Publishers have sent epoch numbers, epoch numbers as strings, and
 * ISO-8601 strings with and without a zone suffix.
 */
export type RawTimestamp =
  | { kind: 'numeric'; seconds: number }
  | { kind: 'iso'; text: string }
  | { kind: 'unresolved' };
