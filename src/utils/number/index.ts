/**
 * Number utilities
 *
 * Strict checks that never coerce their input, used when reading
 * loosely-typed telemetry values.
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 * - isFinite("5") = true (coerces to number)
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && isFinite(value);
}

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && isFinite(value) && Math.floor(value) === value;
}

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse text that is exactly a decimal number literal
 *
 * Surrounding whitespace is ignored. Anything else ("12abc", "0x10",
 * "Infinity", "") yields null, unlike parseFloat().
 *
 * @param text - Text to parse
 * @returns Finite number, or null when the text is not a decimal literal
 */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return isFiniteNumber(value) ? value : null;
}
