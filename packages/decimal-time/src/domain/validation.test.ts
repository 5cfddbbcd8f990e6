/**
 * Tests for Zod validation schemas.
 */

import { describe, it, expect } from 'vitest';
import {
  calendarTimestampSchema,
  decimalTimeSchema,
  decimalTimeSchemaFor,
  roundingPolicySchema,
} from './validation.js';
import { gregorianCalendar } from '../calendar/gregorian.js';
import type { Calendar } from '../calendar/types.js';

describe('roundingPolicySchema', () => {
  it('accepts known policies', () => {
    expect(roundingPolicySchema.parse('nearest')).toBe('nearest');
    expect(roundingPolicySchema.parse('truncate')).toBe('truncate');
  });

  it('rejects unknown policies', () => {
    expect(() => roundingPolicySchema.parse('ceil')).toThrow();
    expect(() => roundingPolicySchema.parse(1)).toThrow();
  });
});

describe('decimalTimeSchema', () => {
  it('accepts convertible decimal times', () => {
    expect(decimalTimeSchema.parse({ year: 2025, dayOfYear: 73, decimalDay: 0.5 })).toEqual({
      year: 2025,
      dayOfYear: 73,
      decimalDay: 0.5,
    });
    expect(decimalTimeSchema.parse({ year: 2024, dayOfYear: 366, decimalDay: 0 }).dayOfYear).toBe(366);
  });

  it('rejects day 366 of a common year', () => {
    const result = decimalTimeSchema.safeParse({ year: 2025, dayOfYear: 366, decimalDay: 0.5 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['dayOfYear']);
    }
  });

  it('rejects day 0 and fractional days', () => {
    expect(decimalTimeSchema.safeParse({ year: 2025, dayOfYear: 0, decimalDay: 0.5 }).success).toBe(false);
    expect(decimalTimeSchema.safeParse({ year: 2025, dayOfYear: 1.5, decimalDay: 0.5 }).success).toBe(false);
  });

  it('rejects fractions outside [0, 1)', () => {
    expect(decimalTimeSchema.safeParse({ year: 2025, dayOfYear: 1, decimalDay: 1 }).success).toBe(false);
    expect(decimalTimeSchema.safeParse({ year: 2025, dayOfYear: 1, decimalDay: -0.1 }).success).toBe(false);
  });

  it('rejects missing fields and non-numbers', () => {
    expect(decimalTimeSchema.safeParse({ year: 2025, dayOfYear: 1 }).success).toBe(false);
    expect(decimalTimeSchema.safeParse({ year: '2025', dayOfYear: 1, decimalDay: 0 }).success).toBe(false);
    expect(decimalTimeSchema.safeParse(null).success).toBe(false);
  });
});

describe('decimalTimeSchemaFor', () => {
  it('uses the supplied calendar for the year length', () => {
    const shortYears: Calendar = { ...gregorianCalendar, daysInYear: () => 360 };
    const schema = decimalTimeSchemaFor(shortYears);
    expect(schema.safeParse({ year: 2025, dayOfYear: 360, decimalDay: 0 }).success).toBe(true);
    expect(schema.safeParse({ year: 2025, dayOfYear: 361, decimalDay: 0 }).success).toBe(false);
  });
});

describe('calendarTimestampSchema', () => {
  const valid = {
    year: 2025,
    month: 3,
    day: 14,
    hour: 15,
    minute: 9,
    second: 26,
    microsecond: 535_897,
  };

  it('accepts existing timestamps', () => {
    expect(calendarTimestampSchema.parse(valid)).toEqual(valid);
  });

  it('rejects timestamps the calendar does not contain', () => {
    expect(calendarTimestampSchema.safeParse({ ...valid, month: 2, day: 30 }).success).toBe(false);
    expect(calendarTimestampSchema.safeParse({ ...valid, hour: 24 }).success).toBe(false);
  });

  it('rejects non-integer fields', () => {
    expect(calendarTimestampSchema.safeParse({ ...valid, second: 1.5 }).success).toBe(false);
  });
});
