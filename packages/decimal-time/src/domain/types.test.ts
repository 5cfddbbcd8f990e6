import { describe, it, expect } from 'vitest';
import { createDecimalTime, decimalTimesEqual } from './types.js';

describe('createDecimalTime', () => {
  it('should assign the three fields', () => {
    expect(createDecimalTime(2025, 100, 0.25)).toEqual({
      year: 2025,
      dayOfYear: 100,
      decimalDay: 0.25,
    });
  });

  it('should not validate its input', () => {
    expect(createDecimalTime(2025, 0, 1.5)).toEqual({
      year: 2025,
      dayOfYear: 0,
      decimalDay: 1.5,
    });
  });

  it('should produce independent values', () => {
    const a = createDecimalTime(2025, 1, 0);
    const b = { ...a };
    b.dayOfYear = 2;
    expect(a.dayOfYear).toBe(1);
  });
});

describe('decimalTimesEqual', () => {
  it('should compare exactly by default', () => {
    expect(decimalTimesEqual(createDecimalTime(2025, 1, 0.5), createDecimalTime(2025, 1, 0.5))).toBe(true);
    expect(decimalTimesEqual(createDecimalTime(2025, 1, 0.5), createDecimalTime(2025, 1, 0.5000001))).toBe(false);
  });

  it('should allow the fraction to differ within epsilon', () => {
    expect(
      decimalTimesEqual(createDecimalTime(2025, 1, 0.5), createDecimalTime(2025, 1, 0.5000001), 1e-6),
    ).toBe(true);
  });

  it('should require the same year and day', () => {
    expect(decimalTimesEqual(createDecimalTime(2025, 1, 0.5), createDecimalTime(2025, 2, 0.5), 1)).toBe(false);
    expect(decimalTimesEqual(createDecimalTime(2024, 1, 0.5), createDecimalTime(2025, 1, 0.5), 1)).toBe(false);
  });
});
