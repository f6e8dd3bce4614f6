import { EMBEDDED_TIMESTAMP_LENGTH } from './constants.js';

/** Language flag appended to set-time payloads; 1 = English. */
export const LANGUAGE_ENGLISH = 1;

function toBcd(value: number): number {
  return (Math.floor(value / 10) << 4) | value % 10;
}

export interface BcdTimeOptions {
  language?: number;
}

/**
 * Encode a local date/time as the ring's 7-byte set-time payload:
 * BCD year-2000, month, day, hour, minute, second, then the language flag.
 */
export function encodeBcdTime(date: Date, opts: BcdTimeOptions = {}): Buffer {
  const year = date.getFullYear();
  if (year < 2000 || year > 2099) {
    throw new RangeError(`Year ${year} cannot be encoded (supported: 2000-2099)`);
  }
  return Buffer.from([
    toBcd(year - 2000),
    toBcd(date.getMonth() + 1),
    toBcd(date.getDate()),
    toBcd(date.getHours()),
    toBcd(date.getMinutes()),
    toBcd(date.getSeconds()),
    opts.language ?? LANGUAGE_ENGLISH,
  ]);
}

/** Calendar fields of the start timestamp embedded in bulk sleep data. */
export interface EmbeddedTimestamp {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/**
 * Decode the 6-byte embedded timestamp (plain integers, not BCD):
 * year-2000, month, day, hour, minute, second.
 * Returns null when any field is outside its calendar range, or the day does
 * not exist in that month.
 */
export function decodeEmbeddedTimestamp(bytes: Uint8Array): EmbeddedTimestamp | null {
  if (bytes.length < EMBEDDED_TIMESTAMP_LENGTH) return null;
  const [yy, month, day, hour, minute, second] = bytes;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;
  // Day 31 of a 30-day month (or Feb 29 outside leap years) would roll over
  const date = new Date(2000 + yy, month - 1, day);
  if (date.getMonth() !== month - 1 || date.getDate() !== day) return null;
  return { year: 2000 + yy, month, day, hour, minute, second };
}

export function embeddedTimestampToDate(ts: EmbeddedTimestamp): Date {
  return new Date(ts.year, ts.month - 1, ts.day, ts.hour, ts.minute, ts.second);
}
