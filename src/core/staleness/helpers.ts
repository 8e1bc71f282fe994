/**
 * Staleness helper functions
 */

/**
 * Seconds elapsed since an instant
 *
 * A publisher clock ahead of ours gives a negative value; it is
 * returned as-is.
 *
 * @param nowSec - Current time in seconds
 * @param instant - Past instant in seconds
 * @returns nowSec - instant
 */
export function elapsedSince(nowSec: number, instant: number): number {
  return nowSec - instant;
}
