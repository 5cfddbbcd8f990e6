/**
 * Decimal time: conversion between calendar timestamps and
 * (year, day of year, fraction of day), plus template formatting.
 * Every function is synchronous and side-effect free.
 */

/**
 * Re-export the decimal-time value type, errors and validation schemas.
 */
export * from './domain/index.js';

/**
 * Re-export day-length constants.
 */
export * from './time/index.js';

/**
 * Re-export the calendar collaborator and its Gregorian default.
 */
export * from './calendar/index.js';

/**
 * Re-export conversion functions.
 */
export * from './conversion/index.js';

/**
 * Re-export the template formatter.
 */
export * from './format/index.js';
