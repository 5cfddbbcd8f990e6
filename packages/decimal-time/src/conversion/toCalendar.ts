import type { CalendarTimestamp } from '../calendar/types.js';
import { utcDateFromCalendarTimestamp } from '../calendar/utcDate.js';
import {
  conversionFailure,
  conversionSuccess,
  type ConversionResult,
} from '../domain/errors.js';
import type { DecimalTime } from '../domain/types.js';
import {
  MAX_MICROSECOND_OF_DAY,
  MICROSECONDS_PER_DAY,
  MICROSECONDS_PER_SECOND,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
} from '../time/constants.js';
import {
  resolveConversionOptions,
  type ConversionOptions,
  type RoundingPolicy,
} from './options.js';
import { resolveCalendarDate } from './validate.js';

/**
 * Scales a day fraction in [0, 1) to whole microseconds into the day.
 *
 * Fractions just below 1 can round up to a full day; those are held at the
 * last microsecond so the result never spills into the next day.
 */
export function microsecondsIntoDay(
  decimalDay: number,
  rounding: RoundingPolicy,
): number {
  const scaled = decimalDay * MICROSECONDS_PER_DAY;

  let microseconds: number;
  switch (rounding) {
    case 'nearest':
      microseconds = Math.round(scaled);
      break;
    case 'truncate':
      microseconds = Math.floor(scaled);
      break;
    default:
      const _exhaustive: never = rounding;
      throw new Error(`Unknown rounding policy: ${_exhaustive}`);
  }

  return Math.min(microseconds, MAX_MICROSECOND_OF_DAY);
}

/**
 * Converts a decimal time to a naive calendar timestamp.
 *
 * The date is January 1 of `year` plus `dayOfYear - 1` days; the time of day
 * is `decimalDay * 86,400,000,000` microseconds split into h/m/s/µs.
 *
 * @returns The calendar timestamp, or `InvalidDecimalTime` when `dayOfYear` is 0,
 *          exceeds the days in `year`, or `decimalDay` is outside [0, 1)
 *
 * @example
 * toCalendarTimestamp(createDecimalTime(2025, 73, 0.75))
 * // { success: true, data: { year: 2025, month: 3, day: 14, hour: 18, minute: 0, second: 0, microsecond: 0 } }
 */
export function toCalendarTimestamp(
  decimalTime: DecimalTime,
  options?: ConversionOptions,
): ConversionResult<CalendarTimestamp> {
  const resolved = resolveConversionOptions(options);

  const date = resolveCalendarDate(decimalTime, resolved);
  if (!date.success) {
    return date;
  }

  const microseconds = microsecondsIntoDay(decimalTime.decimalDay, resolved.rounding);
  const totalSeconds = Math.floor(microseconds / MICROSECONDS_PER_SECOND);

  return conversionSuccess({
    year: decimalTime.year,
    month: date.data.month,
    day: date.data.day,
    hour: Math.floor(totalSeconds / SECONDS_PER_HOUR),
    minute: Math.floor((totalSeconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE),
    second: totalSeconds % SECONDS_PER_MINUTE,
    microsecond: microseconds % MICROSECONDS_PER_SECOND,
  });
}

/**
 * Converts a decimal time to a UTC-tagged Date. No timezone shifting is applied;
 * Date holds milliseconds, so sub-millisecond digits are truncated.
 *
 * @returns The instant, or `InvalidDecimalTime` when it lies outside the
 *          ±8.64e15 ms range of Date
 */
export function toUtcDate(
  decimalTime: DecimalTime,
  options?: ConversionOptions,
): ConversionResult<Date> {
  const timestamp = toCalendarTimestamp(decimalTime, options);
  if (!timestamp.success) {
    return timestamp;
  }
  const date = utcDateFromCalendarTimestamp(timestamp.data);
  if (Number.isNaN(date.getTime())) {
    return conversionFailure(
      'InvalidDecimalTime',
      `Decimal time ${decimalTime.year}/${decimalTime.dayOfYear}/${decimalTime.decimalDay} is outside the range of Date`,
    );
  }
  return conversionSuccess(date);
}
