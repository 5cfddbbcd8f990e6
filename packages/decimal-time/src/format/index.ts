/**
 * Template formatting for decimal-time values.
 */

export * from './plainDecimal.js';
export * from './format.js';
