import {
  MICROSECONDS_PER_MILLISECOND,
  MILLISECONDS_PER_DAY,
} from '../time/constants.js';
import type { Calendar, CalendarTimestamp, MonthAndDay } from './types.js';
import { utcDateFromFields } from './utcDate.js';

/**
 * Years per Gregorian cycle. The calendar repeats every 400 years (146,097 days).
 */
export const GREGORIAN_CYCLE_YEARS = 400;

/**
 * First year of the window that every year is mapped into before Date
 * arithmetic, well inside the ±8.64e15 ms range of Date.
 */
const CYCLE_BASE_YEAR = 2000;

/**
 * Maps a year to the year in [2000, 2399] with the same position in the
 * 400-year cycle, so leap years and day counts are unchanged.
 */
export function cycleEquivalentYear(year: number): number {
  const offset =
    ((year % GREGORIAN_CYCLE_YEARS) + GREGORIAN_CYCLE_YEARS) % GREGORIAN_CYCLE_YEARS;
  return offset + CYCLE_BASE_YEAR;
}

function isValidDateTime(timestamp: CalendarTimestamp): boolean {
  const { year, month, day, hour, minute, second, microsecond } = timestamp;

  // Date stores milliseconds, so the sub-millisecond part is checked here
  if (!Number.isInteger(microsecond)) {
    return false;
  }
  const millisecond = Math.floor(microsecond / MICROSECONDS_PER_MILLISECOND);

  const cycleYear = cycleEquivalentYear(year);
  const date = utcDateFromFields(cycleYear, month, day, hour, minute, second, millisecond);

  // Date rolls invalid fields over (Feb 30 -> Mar 2, 25:00 -> next day),
  // so a timestamp is valid only if every field survives unchanged
  return (
    date.getUTCFullYear() === cycleYear &&
    date.getUTCMonth() + 1 === month &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second &&
    date.getUTCMilliseconds() === millisecond
  );
}

function dayOfYear(year: number, month: number, day: number): number {
  const cycleYear = cycleEquivalentYear(year);
  const start = utcDateFromFields(cycleYear, 1, 1).getTime();
  const date = utcDateFromFields(cycleYear, month, day).getTime();
  return Math.round((date - start) / MILLISECONDS_PER_DAY) + 1;
}

function dateFromDayOfYear(
  year: number,
  ordinal: number,
): MonthAndDay | undefined {
  if (!Number.isInteger(year) || !Number.isInteger(ordinal) || ordinal < 1) {
    return undefined;
  }

  // January 1 plus (ordinal - 1) days; Date carries the overflow into later months
  const cycleYear = cycleEquivalentYear(year);
  const date = utcDateFromFields(cycleYear, 1, ordinal);
  if (date.getUTCFullYear() !== cycleYear) {
    return undefined;
  }

  return {
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
}

function daysInYear(year: number): number {
  return dayOfYear(year, 12, 31);
}

/**
 * Proleptic Gregorian calendar backed by the platform Date in UTC.
 *
 * UTC has no daylight-saving gaps, so every calendar day is exactly
 * 86,400,000 ms long and day differences are exact. Years are first mapped
 * into one 400-year cycle, so any integer year is accepted, including years
 * outside the range a Date can hold.
 *
 * @example
 * gregorianCalendar.dayOfYear(2025, 3, 14) // 73
 * gregorianCalendar.dateFromDayOfYear(2024, 366) // { month: 12, day: 31 }
 * gregorianCalendar.dateFromDayOfYear(2025, 366) // undefined
 */
export const gregorianCalendar: Calendar = {
  isValidDateTime,
  dayOfYear,
  dateFromDayOfYear,
  daysInYear,
};
