/**
 * Core logic for untilclock: resolving a time of day to its next occurrence
 * and counting down to it. Pure TypeScript; the clock, the sleep and the
 * output are all supplied by the caller.
 */

/**
 * Re-export the error types and their terminal rendering.
 */
export * from './errors.js';

/**
 * Re-export time-of-day parsing and resolution.
 */
export * from './time/index.js';

/**
 * Re-export duration formatting and the countdown driver.
 */
export * from './countdown/index.js';
