import { parseWallClockTime } from './parse.js';
import type { WallClockTime } from './wallClock.js';

/**
 * Which calendar day, relative to "now", a target falls on.
 */
export type RelativeDay = 'today' | 'tomorrow';

/**
 * The next absolute instant at which a wall-clock time occurs.
 */
export interface TargetInstant {
  readonly instant: Date;
  readonly time: WallClockTime;
  /** Day the target fell on when it was resolved; see {@link relativeDay} for later renders */
  readonly day: RelativeDay;
}

function onLocalDay(now: Date, dayOffset: number, time: WallClockTime): Date {
  return new Date(
    now.getFullYear(),
    now.getMonth(),
    now.getDate() + dayOffset,
    time.hour,
    time.minute,
    time.second,
  );
}

/**
 * Finds the next occurrence of `time` strictly after `now`, on the local clock.
 * A time equal to `now` counts as already passed and rolls to tomorrow.
 * Tomorrow is the next calendar date, so DST changes keep the wall-clock time.
 *
 * Wall-clock times that a DST change repeats or skips follow `Date`:
 * - In a fall-back hour the first of the two instants is used, so at 1:45 on
 *   the second pass a target of 1:30 rolls to tomorrow.
 * - In a spring-forward gap the instant moves past the gap (2:30 becomes
 *   3:30) while `time` still reads 2:30.
 */
export function resolveWallClockTime(time: WallClockTime, now: Date): TargetInstant {
  const today = onLocalDay(now, 0, time);
  if (today.getTime() > now.getTime()) {
    return { instant: today, time, day: relativeDay(today, now) };
  }
  const tomorrow = onLocalDay(now, 1, time);
  return { instant: tomorrow, time, day: relativeDay(tomorrow, now) };
}

function sameLocalDate(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth() && a.getDate() === b.getDate()
  );
}

/**
 * Labels `instant` relative to `now` by local calendar date.
 * A countdown that crosses midnight turns "tomorrow" into "today".
 */
export function relativeDay(instant: Date, now: Date): RelativeDay {
  return sameLocalDate(instant, now) ? 'today' : 'tomorrow';
}

/**
 * Parses `text` and resolves it against `now`.
 * Pure: the same text and `now` always give the same target.
 *
 * @throws ParseError when `text` is not a valid time of day
 *
 * @example
 * // now = 09:30 local
 * resolve('9', now)      // tomorrow 09:00
 * resolve('9:30pm', now) // today 21:30
 */
export function resolve(text: string, now: Date): TargetInstant {
  return resolveWallClockTime(parseWallClockTime(text), now);
}
