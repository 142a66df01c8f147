import { FormatError } from './errors.js';

// Date, optionally followed by a time and then an optional UTC offset.
const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse a caller-supplied ISO-8601 date or date-time.
 *
 * Values without an offset are read as UTC. Anything else (wrong shape,
 * out-of-range fields such as `2024-02-30`) is a `FormatError`.
 */
export function parseIsoDateTime(value: string, field: string): Date {
  const invalid = () => new FormatError(
    `Invalid date format for '${field}': ${value}. Please use ISO-8601 format.`,
  );

  const match = ISO_DATE_TIME.exec(value.trim());
  if (!match) throw invalid();

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac, offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = frac ? Number(frac.padEnd(3, '0').slice(0, 3)) : 0;

  if (hour > 23 || minute > 59 || second > 59) throw invalid();

  const utc = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  if (
    utc.getUTCFullYear() !== year
    || utc.getUTCMonth() !== month - 1
    || utc.getUTCDate() !== day
  ) {
    throw invalid();
  }

  return new Date(utc.getTime() - offsetMinutes(offset) * 60_000);
}

function offsetMinutes(offset: string | undefined): number {
  if (!offset || offset === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

/** Timestamps are stored as ISO-8601 UTC text so lexical order is chronological. */
export function toStoredTimestamp(date: Date): string {
  return date.toISOString();
}

const HAS_OFFSET = /(?:Z|[+-]\d{2}:?\d{2})$/;
const HOUR_ONLY_OFFSET = /([+-]\d{2})$/;

/**
 * Read a timestamp column from any backend (text, Date or epoch seconds).
 * Text without an offset is UTC, like caller-supplied filters.
 */
export function fromStoredTimestamp(value: string | number | Date): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'number') return new Date(value * 1000);

  const text = value.trim().replace(' ', 'T');
  if (!text.includes('T')) return new Date(text);
  // postgres renders `+00` for UTC; Date wants `+00:00`
  const withOffset = text.replace(HOUR_ONLY_OFFSET, '$1:00');
  return new Date(HAS_OFFSET.test(withOffset) ? withOffset : `${withOffset}Z`);
}
