/**
 * Time-of-day parsing and resolution.
 *
 * - Constants for clock arithmetic and field ranges
 * - The WallClockTime model and its 12-hour formatting
 * - The time expression grammar
 * - Resolution of a time of day to its next future instant
 */

export * from './constants.js';
export * from './wallClock.js';
export * from './parse.js';
export * from './resolve.js';
