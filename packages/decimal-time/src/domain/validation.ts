/**
 * Zod validation schemas for decimal-time inputs from untrusted sources.
 * Calendar rules are delegated to a Calendar implementation.
 */

import { z } from 'zod';
import { gregorianCalendar } from '../calendar/gregorian.js';
import type { Calendar, CalendarTimestamp } from '../calendar/types.js';
import type { RoundingPolicy } from '../conversion/options.js';
import type { DecimalTime } from './types.js';

/**
 * Schema for RoundingPolicy.
 */
export const roundingPolicySchema: z.ZodType<RoundingPolicy> = z.enum([
  'nearest',
  'truncate',
]);

/**
 * Creates a schema for DecimalTime that checks the day against the given calendar.
 *
 * @param calendar - Calendar supplying the number of days in each year
 * @returns A Zod schema accepting only convertible decimal times
 */
export function decimalTimeSchemaFor(calendar: Calendar): z.ZodType<DecimalTime> {
  return z
    .object({
      year: z.number().int(),
      dayOfYear: z.number().int().min(1),
      decimalDay: z.number().min(0).lt(1),
    })
    .refine((data) => data.dayOfYear <= calendar.daysInYear(data.year), {
      message: 'dayOfYear must not exceed the number of days in year',
      path: ['dayOfYear'],
    });
}

/**
 * Creates a schema for CalendarTimestamp that checks the fields against the given calendar.
 */
export function calendarTimestampSchemaFor(
  calendar: Calendar,
): z.ZodType<CalendarTimestamp> {
  return z
    .object({
      year: z.number().int(),
      month: z.number().int(),
      day: z.number().int(),
      hour: z.number().int(),
      minute: z.number().int(),
      second: z.number().int(),
      microsecond: z.number().int(),
    })
    .refine((data) => calendar.isValidDateTime(data), {
      message: 'fields must form an existing calendar date and time',
    });
}

/**
 * Schema for DecimalTime in the proleptic Gregorian calendar.
 */
export const decimalTimeSchema = decimalTimeSchemaFor(gregorianCalendar);

/**
 * Schema for CalendarTimestamp in the proleptic Gregorian calendar.
 */
export const calendarTimestampSchema = calendarTimestampSchemaFor(gregorianCalendar);
