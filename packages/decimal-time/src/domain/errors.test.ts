import { describe, it, expect } from 'vitest';
import {
  DecimalTimeError,
  conversionFailure,
  conversionSuccess,
  unwrapConversion,
} from './errors.js';

describe('DecimalTimeError', () => {
  it('should carry its kind and message', () => {
    const error = new DecimalTimeError('InvalidTimestamp', 'bad month');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DecimalTimeError');
    expect(error.kind).toBe('InvalidTimestamp');
    expect(error.message).toBe('bad month');
  });
});

describe('unwrapConversion', () => {
  it('should return the data of a successful result', () => {
    expect(unwrapConversion(conversionSuccess(42))).toBe(42);
  });

  it('should throw the error of a failed result', () => {
    const result = conversionFailure<number>('InvalidDecimalTime', 'day out of range');
    expect(() => unwrapConversion(result)).toThrow(DecimalTimeError);
    expect(() => unwrapConversion(result)).toThrow('day out of range');
  });
});
