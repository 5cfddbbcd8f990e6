import { MICROSECONDS_PER_MILLISECOND } from '../time/constants.js';
import type { CalendarTimestamp } from './types.js';

/**
 * Builds a Date from UTC fields without the two-digit year mapping of Date.UTC.
 * Out-of-range fields are normalized by Date (Feb 30 -> Mar 2), so callers
 * that need validation read the fields back.
 */
export function utcDateFromFields(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millisecond = 0,
): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millisecond);
  return date;
}

/**
 * Reads the UTC calendar fields of an instant, dropping the timezone tag.
 * Date carries milliseconds, so the microsecond field is always a multiple of 1000.
 */
export function calendarTimestampFromUtcDate(date: Date): CalendarTimestamp {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    microsecond: date.getUTCMilliseconds() * MICROSECONDS_PER_MILLISECOND,
  };
}

/**
 * Tags a calendar timestamp as UTC. Sub-millisecond digits are truncated.
 */
export function utcDateFromCalendarTimestamp(timestamp: CalendarTimestamp): Date {
  return utcDateFromFields(
    timestamp.year,
    timestamp.month,
    timestamp.day,
    timestamp.hour,
    timestamp.minute,
    timestamp.second,
    Math.floor(timestamp.microsecond / MICROSECONDS_PER_MILLISECOND),
  );
}
