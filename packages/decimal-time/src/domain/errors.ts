/**
 * Failure kinds reported by the conversion engine.
 * - `InvalidTimestamp`: calendar fields do not form an existing date and time
 * - `InvalidDecimalTime`: day of year or day fraction lies outside its year or day
 */
export type DecimalTimeErrorKind = 'InvalidTimestamp' | 'InvalidDecimalTime';

/**
 * Error carried by a failed conversion.
 */
export class DecimalTimeError extends Error {
  readonly kind: DecimalTimeErrorKind;

  constructor(kind: DecimalTimeErrorKind, message: string) {
    super(message);
    this.name = 'DecimalTimeError';
    this.kind = kind;
  }
}

/**
 * Outcome of a conversion that can fail (discriminated on `success`).
 */
export type ConversionResult<T> =
  | { success: true; data: T }
  | { success: false; error: DecimalTimeError };

export function conversionSuccess<T>(data: T): ConversionResult<T> {
  return { success: true, data };
}

export function conversionFailure<T>(
  kind: DecimalTimeErrorKind,
  message: string,
): ConversionResult<T> {
  return { success: false, error: new DecimalTimeError(kind, message) };
}

/**
 * Returns the converted value, throwing the carried DecimalTimeError on failure.
 */
export function unwrapConversion<T>(result: ConversionResult<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
