/**
 * Time helper functions
 */

/**
 * Format a duration for display
 * @param seconds - Duration in seconds (fraction is dropped)
 * @returns "45s", "2m 05s" or "3h 07m"
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));

  if (total < 60) {
    return total + 's';
  }

  const minutes = Math.floor(total / 60);
  if (minutes < 60) {
    return minutes + 'm ' + pad2(total % 60) + 's';
  }

  return Math.floor(minutes / 60) + 'h ' + pad2(minutes % 60) + 'm';
}

/**
 * Zero-pad a number to two digits
 * @param value - Non-negative integer
 * @returns Two-character string for values below 100
 */
export function pad2(value: number): string {
  return value < 10 ? '0' + value : String(value);
}
