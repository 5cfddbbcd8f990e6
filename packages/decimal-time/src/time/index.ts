/**
 * Day-length constants shared by the conversion engine and its tests.
 */

export * from './constants.js';
