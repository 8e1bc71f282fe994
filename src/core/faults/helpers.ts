/**
 * Fault decoding helper functions
 */

import { isInteger } from '@utils/number';
import { FaultTableValidationError } from '$types/errors';

import type { TagValue } from '$types/common';
import type { FaultDecoderOptions, FaultTable } from './types';

// Written the way the tag name writes it: no sign, no leading zeros
const FAULT_INDEX_KEY = /^(0|[1-9]\d*)$/;

export const DEFAULT_FAULT_OPTIONS: Readonly<FaultDecoderOptions> = {
  faultArrayPrefix: 'system.general.faultArray',
  faultArraySize: 99,
  systemFaultTag: 'system.general.systemFault'
};

/**
 * Tag key of one fault bit
 * @param prefix - Fault array key prefix
 * @param index - Bit position
 * @returns "<prefix>[<index>]"
 */
export function faultKey(prefix: string, index: number): string {
  return prefix + '[' + index + ']';
}

/**
 * Placeholder description for an unmapped fault index
 * @param index - Bit position
 * @returns "Fault Code #<index>"
 */
export function unmappedDescription(index: number): string {
  return 'Fault Code #' + index;
}

/**
 * Whether a fault tag value means "active"
 *
 * Publishers send booleans, 0/1 integers and occasionally text.
 * Text is active unless it is empty, "0" or "false" (any case).
 *
 * @param value - Tag value, undefined when the tag is missing
 * @returns True when the fault is active
 */
export function isFaultActive(value: TagValue | undefined): boolean {
  if (value === undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !isNaN(value);

  const text = value.trim().toLowerCase();
  return text !== '' && text !== '0' && text !== 'false';
}

/**
 * Build a fault table from decoded JSON
 *
 * Expects an object mapping non-negative integer keys to non-empty strings,
 * e.g. { "2": "Water coolant primary flow reads off" }.
 *
 * @param json - Decoded JSON value
 * @returns Fault table
 * @throws {FaultTableValidationError} If the shape, a key or a description is invalid
 */
export function parseFaultTable(json: unknown): FaultTable {
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new FaultTableValidationError('Fault table must be a JSON object of index → description');
  }

  const table = new Map<number, string>();
  const entries = Object.entries(json);

  for (let i = 0; i < entries.length; i++) {
    const key = entries[i][0];
    const description: unknown = entries[i][1];
    const index = Number(key);

    if (!FAULT_INDEX_KEY.test(key) || !isInteger(index)) {
      throw new FaultTableValidationError('Fault table key must be a non-negative integer, got "' + key + '"');
    }
    if (typeof description !== 'string' || description.trim() === '') {
      throw new FaultTableValidationError('Fault table entry ' + key + ' must be a non-empty string');
    }

    table.set(index, description);
  }

  return table;
}
