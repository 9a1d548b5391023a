/**
 * FORECAST DATA: Date handling
 *
 * All calendar days and hourly timestamps are expressed in the market's
 * business timezone.
 */

import { isValid, parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import type { DateInput } from './forecast.types.js';

export const BUSINESS_TIMEZONE = 'America/Chicago';

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;
const HAS_OFFSET_RE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Normalize a date-like value to a `YYYY-MM-DD` calendar date.
 * A `Date` at exactly UTC midnight is a calendar date (`new Date('2023-11-20')`)
 * and keeps its UTC day; any other instant is read in the business timezone.
 * Strings that are not dates at all (e.g. `latest`) are returned unchanged.
 */
export function toIsoDate(value: DateInput): string {
  if (value instanceof Date) {
    if (!isValid(value)) return String(value);
    const zone = isUtcMidnight(value) ? 'UTC' : BUSINESS_TIMEZONE;
    return formatInTimeZone(value, zone, 'yyyy-MM-dd');
  }

  const trimmed = value.trim();
  if (ISO_DATE_RE.test(trimmed)) return trimmed;

  const instant = parseBusinessTimestamp(trimmed);
  return instant ? formatInTimeZone(instant, BUSINESS_TIMEZONE, 'yyyy-MM-dd') : trimmed;
}

function isUtcMidnight(value: Date): boolean {
  return value.getTime() % DAY_MS === 0;
}

/**
 * Parse an ISO timestamp. Strings without an offset are read as
 * business-timezone wall-clock time.
 */
export function parseBusinessTimestamp(value: string): Date | null {
  const trimmed = value.trim();
  if (!trimmed) return null;

  const parsed = HAS_OFFSET_RE.test(trimmed)
    ? parseISO(trimmed)
    : fromZonedTime(trimmed, BUSINESS_TIMEZONE);

  return isValid(parsed) ? parsed : null;
}

/**
 * Render a timestamp cell as ISO-8601 with the business-timezone offset.
 * Unparseable values come back unchanged.
 */
export function toBusinessTimestamp(value: string | number): string {
  const instant = typeof value === 'number' ? new Date(value) : parseBusinessTimestamp(value);
  if (!instant || !isValid(instant)) return String(value);
  return formatInTimeZone(instant, BUSINESS_TIMEZONE, "yyyy-MM-dd'T'HH:mm:ssXXX");
}
