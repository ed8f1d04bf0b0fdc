import { MS_PER_SECOND, SECONDS_PER_HOUR, SECONDS_PER_MINUTE } from '../time/constants.js';
import type { TargetInstant } from '../time/resolve.js';

/**
 * Time left until a target, in whole units. Never negative.
 */
export interface RemainingDuration {
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

/**
 * How a duration is written out.
 * - clock: `HH:MM:SS`
 * - words: `3 hours 12 minutes`
 */
export type DurationStyle = 'clock' | 'words';

/**
 * Splits a span of milliseconds into hours, minutes and seconds.
 * Partial seconds round up, so a duration only reads zero once the span has
 * fully elapsed. Negative spans clamp to zero.
 *
 * @example
 * durationFromMs(3_600_000) // { hours: 1, minutes: 0, seconds: 0 }
 * durationFromMs(1_400)     // { hours: 0, minutes: 0, seconds: 2 }
 * durationFromMs(-5)        // { hours: 0, minutes: 0, seconds: 0 }
 */
export function durationFromMs(ms: number): RemainingDuration {
  const total = Math.max(0, Math.ceil(ms / MS_PER_SECOND));
  return {
    hours: Math.floor(total / SECONDS_PER_HOUR),
    minutes: Math.floor((total % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE),
    seconds: total % SECONDS_PER_MINUTE,
  };
}

/**
 * Remaining duration from `now` until the target instant.
 */
export function remainingDuration(target: TargetInstant, now: Date): RemainingDuration {
  return durationFromMs(target.instant.getTime() - now.getTime());
}

/**
 * Whole seconds in a duration.
 */
export function totalSeconds(duration: RemainingDuration): number {
  return duration.hours * SECONDS_PER_HOUR + duration.minutes * SECONDS_PER_MINUTE + duration.seconds;
}

/**
 * True once nothing is left.
 */
export function isElapsed(duration: RemainingDuration): boolean {
  return totalSeconds(duration) === 0;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * @example
 * formatClockDuration({ hours: 1, minutes: 0, seconds: 5 }) // "01:00:05"
 */
export function formatClockDuration(duration: RemainingDuration): string {
  return `${pad2(duration.hours)}:${pad2(duration.minutes)}:${pad2(duration.seconds)}`;
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/**
 * Writes out the non-zero units of a duration.
 *
 * @example
 * formatWordsDuration({ hours: 3, minutes: 12, seconds: 0 }) // "3 hours 12 minutes"
 * formatWordsDuration({ hours: 0, minutes: 1, seconds: 1 })  // "1 minute 1 second"
 * formatWordsDuration({ hours: 0, minutes: 0, seconds: 0 })  // "0 seconds"
 */
export function formatWordsDuration(duration: RemainingDuration): string {
  const parts: string[] = [];
  if (duration.hours > 0) parts.push(plural(duration.hours, 'hour'));
  if (duration.minutes > 0) parts.push(plural(duration.minutes, 'minute'));
  if (duration.seconds > 0 || parts.length === 0) parts.push(plural(duration.seconds, 'second'));
  return parts.join(' ');
}

/**
 * Formats a duration in the given style.
 */
export function formatDuration(duration: RemainingDuration, style: DurationStyle): string {
  return style === 'words' ? formatWordsDuration(duration) : formatClockDuration(duration);
}
