/**
 * Day-length constants.
 *
 * Decimal time measures the elapsed part of a calendar day as a fraction.
 * Fractions are computed over whole microseconds:
 * - Each day has 86,400 seconds (24 hours × 3,600 seconds/hour)
 * - Each day has 86,400,000,000 microseconds
 */

/**
 * Number of seconds per day.
 */
export const SECONDS_PER_DAY = 86_400;

/**
 * Number of seconds per hour.
 */
export const SECONDS_PER_HOUR = 3_600;

/**
 * Number of seconds per minute.
 */
export const SECONDS_PER_MINUTE = 60;

/**
 * Number of microseconds per second.
 */
export const MICROSECONDS_PER_SECOND = 1_000_000;

/**
 * Number of microseconds per millisecond.
 */
export const MICROSECONDS_PER_MILLISECOND = 1_000;

/**
 * Number of microseconds per day.
 */
export const MICROSECONDS_PER_DAY = SECONDS_PER_DAY * MICROSECONDS_PER_SECOND;

/**
 * Last microsecond of a day (23:59:59.999999).
 */
export const MAX_MICROSECOND_OF_DAY = MICROSECONDS_PER_DAY - 1;

/**
 * Number of milliseconds per minute, used for fixed UTC offsets.
 */
export const MILLISECONDS_PER_MINUTE = 60_000;

/**
 * Number of milliseconds per day.
 */
export const MILLISECONDS_PER_DAY = SECONDS_PER_DAY * 1_000;
