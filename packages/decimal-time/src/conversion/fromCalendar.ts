import type { CalendarTimestamp } from '../calendar/types.js';
import { calendarTimestampFromUtcDate } from '../calendar/utcDate.js';
import {
  conversionFailure,
  conversionSuccess,
  type ConversionResult,
} from '../domain/errors.js';
import { createDecimalTime, type DecimalTime } from '../domain/types.js';
import {
  MICROSECONDS_PER_DAY,
  MICROSECONDS_PER_SECOND,
  MILLISECONDS_PER_MINUTE,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
} from '../time/constants.js';
import { resolveConversionOptions, type ConversionOptions } from './options.js';

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function describeTimestamp(timestamp: CalendarTimestamp): string {
  const { year, month, day, hour, minute, second, microsecond } = timestamp;
  return `${year}-${pad(month, 2)}-${pad(day, 2)}T${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}.${pad(microsecond, 6)}`;
}

/**
 * Converts a naive calendar timestamp to decimal time.
 *
 * The day fraction is computed over whole microseconds:
 * `(hour * 3600 + minute * 60 + second) * 1e6 + microsecond` divided by 86,400,000,000.
 *
 * @returns The decimal time, or `InvalidTimestamp` when the calendar rejects the fields
 *
 * @example
 * fromCalendarTimestamp({ year: 2025, month: 3, day: 14, hour: 12, minute: 0, second: 0, microsecond: 0 })
 * // { success: true, data: { year: 2025, dayOfYear: 73, decimalDay: 0.5 } }
 */
export function fromCalendarTimestamp(
  timestamp: CalendarTimestamp,
  options?: ConversionOptions,
): ConversionResult<DecimalTime> {
  const { calendar } = resolveConversionOptions(options);

  if (!calendar.isValidDateTime(timestamp)) {
    return conversionFailure(
      'InvalidTimestamp',
      `Invalid calendar timestamp: ${describeTimestamp(timestamp)}`,
    );
  }

  const { year, month, day, hour, minute, second, microsecond } = timestamp;
  const dayOfYear = calendar.dayOfYear(year, month, day);

  const secondsIntoDay = hour * SECONDS_PER_HOUR + minute * SECONDS_PER_MINUTE + second;
  const microsecondsIntoDay = secondsIntoDay * MICROSECONDS_PER_SECOND + microsecond;

  return conversionSuccess(
    createDecimalTime(year, dayOfYear, microsecondsIntoDay / MICROSECONDS_PER_DAY),
  );
}

/**
 * Converts a UTC instant to decimal time using its UTC calendar fields.
 * No timezone shifting is applied.
 *
 * @returns The decimal time, or `InvalidTimestamp` for an invalid Date
 */
export function fromUtcDate(
  date: Date,
  options?: ConversionOptions,
): ConversionResult<DecimalTime> {
  if (Number.isNaN(date.getTime())) {
    return conversionFailure('InvalidTimestamp', 'Invalid Date');
  }
  return fromCalendarTimestamp(calendarTimestampFromUtcDate(date), options);
}

/**
 * Converts an instant to decimal time as read on a clock at a fixed UTC offset.
 * Positive offsets are east of Greenwich (e.g. +60 for CET).
 *
 * @param offsetMinutes - Offset from UTC in minutes
 */
export function fromOffsetDate(
  date: Date,
  offsetMinutes: number,
  options?: ConversionOptions,
): ConversionResult<DecimalTime> {
  const shifted = new Date(date.getTime() + offsetMinutes * MILLISECONDS_PER_MINUTE);
  return fromUtcDate(shifted, options);
}

/**
 * Decimal time of the current instant at a fixed UTC offset.
 *
 * @param now - Clock returning milliseconds since epoch, `Date.now` by default
 */
export function currentDecimalTime(
  offsetMinutes = 0,
  now: () => number = Date.now,
  options?: ConversionOptions,
): ConversionResult<DecimalTime> {
  return fromOffsetDate(new Date(now()), offsetMinutes, options);
}
