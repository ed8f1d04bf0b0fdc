import { z } from 'zod';
import { HOUR_RANGE, HOURS_PER_HALF_DAY, MINUTE_RANGE, SECOND_RANGE } from './constants.js';

/**
 * A time of day on the 24-hour clock.
 * Only created through {@link createWallClockTime}, so the fields are always in range.
 */
export interface WallClockTime {
  /** Hour, 0-23 */
  readonly hour: number;
  /** Minute, 0-59 */
  readonly minute: number;
  /** Second, 0-59 */
  readonly second: number;
}

/**
 * Schema for a single clock field with inclusive bounds.
 */
export function clockFieldSchema(range: { min: number; max: number }): z.ZodNumber {
  return z.number().int().min(range.min).max(range.max);
}

/**
 * Schema for WallClockTime.
 */
export const wallClockTimeSchema = z.object({
  hour: clockFieldSchema(HOUR_RANGE),
  minute: clockFieldSchema(MINUTE_RANGE),
  second: clockFieldSchema(SECOND_RANGE),
});

/**
 * Creates a frozen WallClockTime, throwing if any field is out of range.
 *
 * @example
 * createWallClockTime(21, 30) // { hour: 21, minute: 30, second: 0 }
 * createWallClockTime(24, 0)  // throws RangeError
 */
export function createWallClockTime(hour: number, minute = 0, second = 0): WallClockTime {
  const result = wallClockTimeSchema.safeParse({ hour, minute, second });
  if (!result.success) {
    throw new RangeError(
      `WallClockTime must be within 00:00:00-23:59:59, got ${hour}:${minute}:${second}`,
    );
  }
  return Object.freeze(result.data);
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a time the way people write it on a 12-hour clock.
 * Seconds are only shown when non-zero.
 *
 * @example
 * formatWallClockTime(createWallClockTime(0, 0))      // "12:00am"
 * formatWallClockTime(createWallClockTime(21, 30))    // "9:30pm"
 * formatWallClockTime(createWallClockTime(6, 30, 15)) // "6:30:15am"
 */
export function formatWallClockTime(time: WallClockTime): string {
  const hour12 = time.hour % HOURS_PER_HALF_DAY || HOURS_PER_HALF_DAY;
  const meridiem = time.hour < HOURS_PER_HALF_DAY ? 'am' : 'pm';
  const seconds = time.second === 0 ? '' : `:${pad2(time.second)}`;
  return `${hour12}:${pad2(time.minute)}${seconds}${meridiem}`;
}
