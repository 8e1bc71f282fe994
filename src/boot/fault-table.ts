/**
 * Fault table loading
 *
 * The built-in table ships as data/fault-codes.json beside this module.
 * FAULT_TABLE_PATH replaces it with an operator-maintained file.
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';

import { parseFaultTable } from '@core/faults';
import { FaultTableValidationError } from '$types/errors';

import type { FaultTable } from '@core/faults';

export const BUILTIN_FAULT_TABLE_PATH = fileURLToPath(new URL('./data/fault-codes.json', import.meta.url));

/**
 * Read and parse a fault table
 * @param filePath - JSON file path; empty selects the built-in table
 * @returns Fault table
 * @throws {FaultTableValidationError} If the file cannot be read, is not JSON, or has bad entries
 */
export function loadFaultTable(filePath: string): FaultTable {
  const target = filePath.trim() === '' ? BUILTIN_FAULT_TABLE_PATH : filePath;

  let text: string;
  try {
    text = fs.readFileSync(target, 'utf8');
  } catch (err) {
    throw new FaultTableValidationError('Cannot read fault table ' + target + ': ' + (err instanceof Error ? err.message : String(err)));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (_err) {
    throw new FaultTableValidationError('Fault table ' + target + ' is not valid JSON');
  }

  return parseFaultTable(json);
}
