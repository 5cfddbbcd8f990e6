import type { MonthAndDay } from '../calendar/types.js';
import {
  conversionFailure,
  conversionSuccess,
  type ConversionResult,
} from '../domain/errors.js';
import { createDecimalTime, type DecimalTime } from '../domain/types.js';
import { resolveConversionOptions, type ConversionOptions } from './options.js';

/**
 * Checks every field of a decimal time and resolves its calendar date.
 *
 * @returns The month and day named by `dayOfYear`, or `InvalidDecimalTime`
 */
export function resolveCalendarDate(
  decimalTime: DecimalTime,
  options?: ConversionOptions,
): ConversionResult<MonthAndDay> {
  const { calendar } = resolveConversionOptions(options);
  const { year, dayOfYear, decimalDay } = decimalTime;

  if (!Number.isInteger(year)) {
    return conversionFailure('InvalidDecimalTime', `year must be an integer, got ${year}`);
  }

  const date = calendar.dateFromDayOfYear(year, dayOfYear);
  if (date === undefined) {
    const days = calendar.daysInYear(year);
    const range = Number.isFinite(days) ? ` in range [1, ${days}]` : '';
    return conversionFailure(
      'InvalidDecimalTime',
      `dayOfYear must be an integer${range} for year ${year}, got ${dayOfYear}`,
    );
  }

  // 1.0 would be midnight of the next day; it is rejected rather than rolled over
  if (!Number.isFinite(decimalDay) || decimalDay < 0 || decimalDay >= 1) {
    return conversionFailure(
      'InvalidDecimalTime',
      `decimalDay must be a finite number in range [0, 1), got ${decimalDay}`,
    );
  }

  return conversionSuccess(date);
}

/**
 * Creates a DecimalTime, checking that the day exists in the year and the
 * fraction lies in [0, 1).
 *
 * @example
 * tryCreateDecimalTime(2024, 366, 0.5) // { success: true, data: { year: 2024, dayOfYear: 366, decimalDay: 0.5 } }
 * tryCreateDecimalTime(2025, 366, 0.5) // { success: false, error: DecimalTimeError (InvalidDecimalTime) }
 */
export function tryCreateDecimalTime(
  year: number,
  dayOfYear: number,
  decimalDay: number,
  options?: ConversionOptions,
): ConversionResult<DecimalTime> {
  const decimalTime = createDecimalTime(year, dayOfYear, decimalDay);
  const date = resolveCalendarDate(decimalTime, options);
  if (!date.success) {
    return date;
  }
  return conversionSuccess(decimalTime);
}

/**
 * Returns true when the decimal time can be converted to a calendar timestamp.
 */
export function isValidDecimalTime(
  decimalTime: DecimalTime,
  options?: ConversionOptions,
): boolean {
  return resolveCalendarDate(decimalTime, options).success;
}
