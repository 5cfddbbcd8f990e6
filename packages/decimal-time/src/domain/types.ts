/**
 * Core decimal-time value types.
 */

/**
 * A point in time expressed as year, ordinal day and elapsed fraction of that day.
 *
 * Fields are plain and writable. Nothing is checked when a value is built;
 * out-of-range fields surface as `InvalidDecimalTime` when the value is
 * converted to a calendar timestamp.
 */
export interface DecimalTime {
  /** Proleptic Gregorian year, may be zero or negative */
  year: number;
  /** 1-based day within the year, 1-365 (1-366 in leap years) */
  dayOfYear: number;
  /** Elapsed fraction of the day in [0, 1): 0 = midnight, 0.5 = noon */
  decimalDay: number;
}

/**
 * Creates a DecimalTime from its three fields without validation.
 *
 * @example
 * createDecimalTime(2025, 73, 0.5) // March 14, 2025 at noon
 */
export function createDecimalTime(
  year: number,
  dayOfYear: number,
  decimalDay: number,
): DecimalTime {
  return { year, dayOfYear, decimalDay };
}

/**
 * Compares two decimal times. Year and day must match exactly; the day
 * fractions may differ by at most `epsilon`.
 */
export function decimalTimesEqual(
  a: DecimalTime,
  b: DecimalTime,
  epsilon = 0,
): boolean {
  return (
    a.year === b.year &&
    a.dayOfYear === b.dayOfYear &&
    Math.abs(a.decimalDay - b.decimalDay) <= epsilon
  );
}
