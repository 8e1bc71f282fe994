/**
 * Timestamp resolution
 * Normalizes heterogeneous snapshot timestamps into seconds since the epoch
 */

import { isFiniteNumber, parseDecimal } from '@utils/number';

import type { RawTimestamp } from './types';
import { parseIsoInstant } from './helpers';

/**
 * Classify a raw timestamp by representation
 *
 * Ordered attempts:
 * 1. Finite number, or text that is exactly a decimal literal → numeric epoch seconds
 * 2. Any other non-empty text → ISO-8601 candidate
 * 3. Everything else (missing, null, boolean, object) → unresolved
 *
 * @param raw - Timestamp value as delivered
 * @returns Tagged representation
 */
export function classifyTimestamp(raw: unknown): RawTimestamp {
  if (isFiniteNumber(raw)) {
    return { kind: 'numeric', seconds: raw };
  }

  if (typeof raw === 'string') {
    const seconds = parseDecimal(raw);
    if (seconds !== null) {
      return { kind: 'numeric', seconds: seconds };
    }
    if (raw.trim() !== '') {
      return { kind: 'iso', text: raw };
    }
  }

  return { kind: 'unresolved' };
}

/**
 * Resolve a raw timestamp to seconds since the epoch
 *
 * Never throws: an unparsable value is an expected outcome and yields null.
 *
 * @param raw - Timestamp value as delivered
 * @returns Seconds since epoch, or null when unresolvable
 *
 * @example
 * ```typescript
 * resolveTimestamp(1700000000);               // 1700000000
 * resolveTimestamp('2023-11-14T22:13:20Z');   // 1700000000
 * resolveTimestamp('soon');                   // null
 * ```
 */
export function resolveTimestamp(raw: unknown): number | null {
  const classified = classifyTimestamp(raw);

  switch (classified.kind) {
    case 'numeric':
      return classified.seconds;
    case 'iso':
      return parseIsoInstant(classified.text);
    case 'unresolved':
      return null;
  }
}

/**
 * Whether a raw timestamp was supplied at all
 * @param raw - Timestamp value as delivered
 * @returns False for undefined and null
 */
export function hasRawTimestamp(raw: unknown): boolean {
  return raw !== undefined && raw !== null;
}
