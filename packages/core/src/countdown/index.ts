/**
 * Remaining-time arithmetic, output and the countdown loop.
 */

export * from './duration.js';
export * from './writer.js';
export * from './driver.js';
