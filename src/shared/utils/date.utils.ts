/**
 * Calendar-date helpers built on Luxon.
 *
 * Game dates in stat records are ISO calendar dates (YYYY-MM-DD) with no time
 * component. Scheduled games carry a date-time; all of them are read in UTC so
 * that the calendar day of a game never depends on the host timezone.
 */

import { DateTime } from 'luxon';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True when `value` is a real calendar date written as YYYY-MM-DD.
 *
 * @example
 * isIsoDate('2025-02-28') // true
 * isIsoDate('2025-02-30') // false
 */
export function isIsoDate(value: string): boolean {
  return ISO_DATE_PATTERN.test(value) && DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

/**
 * Ascending comparator for ISO calendar dates. Zero-padded ISO dates sort
 * lexicographically in date order.
 */
export function compareIsoDates(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Parse an ISO date-time (or bare date) as UTC. Returns null when unparseable.
 */
export function parseUtcDateTime(value: string): Date | null {
  const dt = DateTime.fromISO(value, { zone: 'utc' });
  return dt.isValid ? dt.toJSDate() : null;
}

/**
 * The UTC calendar date (YYYY-MM-DD) of an instant.
 */
export function toIsoDate(date: Date): string {
  return DateTime.fromJSDate(date, { zone: 'utc' }).toFormat('yyyy-MM-dd');
}

/**
 * Whole calendar days from `earlier` to `later`, ignoring time of day.
 */
export function calendarDaysBetween(earlier: Date, later: Date): number {
  const start = DateTime.fromJSDate(earlier, { zone: 'utc' }).startOf('day');
  const end = DateTime.fromJSDate(later, { zone: 'utc' }).startOf('day');
  return Math.round(end.diff(start, 'days').days);
}

/**
 * `date` moved forward by `days` days.
 */
export function addDays(date: Date, days: number): Date {
  return DateTime.fromJSDate(date, { zone: 'utc' }).plus({ days }).toJSDate();
}

/**
 * Format an instant as `YYYY-MM-DD HH:mm` in UTC.
 */
export function formatGameTime(date: Date): string {
  return DateTime.fromJSDate(date, { zone: 'utc' }).toFormat('yyyy-MM-dd HH:mm');
}
