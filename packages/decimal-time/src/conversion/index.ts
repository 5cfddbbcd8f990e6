/**
 * Conversion engine between calendar timestamps and decimal time.
 */

export * from './options.js';
export * from './validate.js';
export * from './fromCalendar.js';
export * from './toCalendar.js';
