/**
 * Clock arithmetic constants.
 */

/**
 * Milliseconds per second.
 */
export const MS_PER_SECOND = 1000;

/**
 * Seconds per minute.
 */
export const SECONDS_PER_MINUTE = 60;

/**
 * Seconds per hour.
 */
export const SECONDS_PER_HOUR = 3600;

/**
 * Hours on a 12-hour clock face. An hour above this is already 24-hour and
 * cannot take an am/pm marker.
 */
export const HOURS_PER_HALF_DAY = 12;

/**
 * Inclusive bounds of each wall-clock field.
 */
export const HOUR_RANGE = { min: 0, max: 23 } as const;
export const MINUTE_RANGE = { min: 0, max: 59 } as const;
export const SECOND_RANGE = { min: 0, max: 59 } as const;

/**
 * Refresh interval of the live countdown.
 */
export const TICK_INTERVAL_MS = 1000;
