/**
 * A calendar date and time of day with no associated timezone.
 * Months and days are 1-based; time fields are 0-based.
 */
export interface CalendarTimestamp {
  /** Proleptic Gregorian year, may be zero or negative */
  year: number;
  /** Month of year, 1-12 */
  month: number;
  /** Day of month, 1-31 */
  day: number;
  /** Hour of day, 0-23 */
  hour: number;
  /** Minute of hour, 0-59 */
  minute: number;
  /** Second of minute, 0-59 */
  second: number;
  /** Microsecond of second, 0-999999 */
  microsecond: number;
}

/**
 * Month and day of month of an ordinal date.
 */
export interface MonthAndDay {
  month: number;
  day: number;
}

/**
 * Calendar arithmetic used by the conversion engine.
 *
 * All leap-year and month-length rules come from an implementation of this
 * interface; the engine never tabulates them itself.
 */
export interface Calendar {
  /**
   * Returns true when every field of the timestamp names an existing
   * calendar date and time of day.
   */
  isValidDateTime(timestamp: CalendarTimestamp): boolean;

  /**
   * 1-based ordinal of a valid date within its year (January 1 = 1).
   */
  dayOfYear(year: number, month: number, day: number): number;

  /**
   * Resolves an ordinal day to its month and day, or undefined when the
   * ordinal falls outside the year.
   */
  dateFromDayOfYear(year: number, dayOfYear: number): MonthAndDay | undefined;

  /**
   * Number of days in the year (365 or 366).
   */
  daysInYear(year: number): number;
}
