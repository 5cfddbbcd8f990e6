/**
 * Domain module public exports.
 * This module contains the decimal-time value type, conversion errors and validation.
 */

// Types
export type { DecimalTime } from './types.js';
export { createDecimalTime, decimalTimesEqual } from './types.js';

// Errors and results
export type { DecimalTimeErrorKind, ConversionResult } from './errors.js';
export {
  DecimalTimeError,
  conversionSuccess,
  conversionFailure,
  unwrapConversion,
} from './errors.js';

// Validation schemas
export {
  roundingPolicySchema,
  decimalTimeSchemaFor,
  calendarTimestampSchemaFor,
  decimalTimeSchema,
  calendarTimestampSchema,
} from './validation.js';
