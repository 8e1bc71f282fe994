/**
 * ISO-8601 parsing helpers
 */

import { isFiniteNumber } from '@utils/number';
import { pad2 } from '@utils/time/helpers';

// date, optional time with optional seconds/fraction, optional offset (time only)
const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?(?:([+-])(\d{2}):?(\d{2}))?)?$/;

// toISOString() throws beyond ±8.64e15 ms
const MAX_DATE_SECONDS = 8.64e12;

/**
 * Parse an ISO-8601 date-time into seconds since the epoch
 *
 * A single trailing "Z" is stripped first; text without an explicit
 * offset is read as UTC. Calendar and clock fields are range-checked.
 *
 * @param text - Date-time text, e.g. "2023-11-14T22:13:20.25Z" or "2023-11-14 23:13:20+01:00"
 * @returns Seconds since epoch (fractional), or null when the text is not a valid date-time
 */
export function parseIsoInstant(text: string): number | null {
  let trimmed = text.trim();
  if (trimmed.charAt(trimmed.length - 1) === 'Z') {
    trimmed = trimmed.slice(0, -1);
  }

  const match = ISO_PATTERN.exec(trimmed);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = match[4] === undefined ? 0 : Number(match[4]);
  const minute = match[5] === undefined ? 0 : Number(match[5]);
  const second = match[6] === undefined ? 0 : Number(match[6]);
  const fraction = match[7] === undefined ? 0 : Number('0.' + match[7]);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  // setUTCFullYear keeps years 0-99 literal (Date.UTC maps them to 19xx)
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  // Rolled-over day means the day does not exist in that month
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
    return null;
  }

  let offsetSec = 0;
  if (match[8] !== undefined) {
    const offsetHours = Number(match[9]);
    const offsetMinutes = Number(match[10]);
    if (offsetHours > 23 || offsetMinutes > 59) return null;
    offsetSec = (offsetHours * 3600 + offsetMinutes * 60) * (match[8] === '-' ? -1 : 1);
  }

  return date.getTime() / 1000 + fraction - offsetSec;
}

/**
 * Pretty-print an instant for display
 * @param seconds - Seconds since epoch
 * @returns "YYYY-MM-DD HH:MM:SS UTC", or "n/a" when not representable
 */
export function formatInstant(seconds: number): string {
  if (!isFiniteNumber(seconds) || Math.abs(seconds) > MAX_DATE_SECONDS) {
    return 'n/a';
  }
  return new Date(Math.floor(seconds) * 1000).toISOString().slice(0, 19).replace('T', ' ') + ' UTC';
}

/**
 * Local wall-clock time of an instant, for compact headers
 * @param seconds - Seconds since epoch
 * @returns "HH:MM:SS" in the process time zone
 */
export function formatClockTime(seconds: number): string {
  const date = new Date(seconds * 1000);
  return pad2(date.getHours()) + ':' + pad2(date.getMinutes()) + ':' + pad2(date.getSeconds());
}
