/**
 * Calendar collaborator: the interface the conversion engine depends on
 * and its default proleptic Gregorian implementation.
 */

export * from './types.js';
export * from './gregorian.js';
export * from './utcDate.js';
