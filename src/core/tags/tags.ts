/**
 * Tag accessor
 *
 * Tag keys look like dotted paths but are opaque strings: lookup is always
 * by the exact key, never by descending through segments.
 */

import type { TagMap, TagValue } from '$types/common';

/**
 * Look up a tag by its exact key
 *
 * @param tags - Tag map, or null/undefined when no snapshot is available
 * @param key - Exact dotted key
 * @param fallback - Value returned when tags or key are absent
 * @returns Stored value, or fallback
 *
 * @example
 * ```typescript
 * getTag(snapshot.tags, 'system.ionSource.general.status', 0);
 * getTag(null, 'missing.key', 0); // 0
 * ```
 */
export function getTag<T>(tags: TagMap | null | undefined, key: string, fallback: T): TagValue | T {
  if (!tags) return fallback;
  const value = tags.get(key);
  return value === undefined ? fallback : value;
}

/**
 * Look up a numeric tag
 * @param tags - Tag map or null/undefined
 * @param key - Exact dotted key
 * @param fallback - Returned when absent or not a number
 * @returns Numeric value or fallback
 */
export function getNumberTag(tags: TagMap | null | undefined, key: string, fallback: number): number {
  const value = getTag(tags, key, fallback);
  return typeof value === 'number' ? value : fallback;
}

/**
 * Look up a boolean tag
 * @param tags - Tag map or null/undefined
 * @param key - Exact dotted key
 * @param fallback - Returned when absent or not a boolean
 * @returns Boolean value or fallback
 */
export function getBooleanTag(tags: TagMap | null | undefined, key: string, fallback: boolean): boolean {
  const value = getTag(tags, key, fallback);
  return typeof value === 'boolean' ? value : fallback;
}

/**
 * Look up a string tag
 * @param tags - Tag map or null/undefined
 * @param key - Exact dotted key
 * @param fallback - Returned when absent or not a string
 * @returns String value or fallback
 */
export function getStringTag(tags: TagMap | null | undefined, key: string, fallback: string): string {
  const value = getTag(tags, key, fallback);
  return typeof value === 'string' ? value : fallback;
}

/**
 * Tag entries sorted by key, for tabular display
 * @param tags - Tag map or null/undefined
 * @returns [key, value] pairs in ascending key order
 */
export function tagEntries(tags: TagMap | null | undefined): Array<[string, TagValue]> {
  if (!tags) return [];
  return Array.from(tags.entries()).sort(function(a, b) {
    if (a[0] < b[0]) return -1;
    return a[0] > b[0] ? 1 : 0;
  });
}
