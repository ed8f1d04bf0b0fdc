import { setTimeout as delay } from 'node:timers/promises';
import { toIoError } from '../errors.js';
import { TICK_INTERVAL_MS } from '../time/constants.js';
import { relativeDay, type RelativeDay, type TargetInstant } from '../time/resolve.js';
import { formatWallClockTime } from '../time/wallClock.js';
import {
  formatDuration,
  isElapsed,
  remainingDuration,
  totalSeconds,
  type DurationStyle,
  type RemainingDuration,
} from './duration.js';
import type { Writer } from './writer.js';

/**
 * print-once writes a single line; live redraws it every tick until the target.
 */
export type Mode = 'print-once' | 'live';

/**
 * Returned when a run finishes normally. Failures are thrown instead.
 */
export interface ExitSignal {
  readonly code: 0;
}

/**
 * Collaborators and settings for {@link runCountdown}.
 */
export interface CountdownOptions {
  writer: Writer;
  /** Clock source, defaults to the system clock */
  now?: () => Date;
  /** Suspends the loop between ticks, defaults to a timer */
  sleep?: (ms: number) => Promise<void>;
  style?: DurationStyle;
  tickMs?: number;
}

/**
 * Carriage return followed by "erase to end of line", so the next render
 * replaces the current terminal line.
 */
export const REDRAW = '\r\u001b[K';

const DONE: ExitSignal = { code: 0 };

/**
 * @example
 * statusLine(target, { hours: 1, minutes: 0, seconds: 0 }, 'clock', 'today')
 * // "01:00:00 until 9:00am today"
 */
export function statusLine(
  target: TargetInstant,
  remaining: RemainingDuration,
  style: DurationStyle,
  day: RelativeDay,
): string {
  return `${formatDuration(remaining, style)} until ${formatWallClockTime(target.time)} ${day}`;
}

/**
 * Final line of a live countdown.
 */
export function completionLine(target: TargetInstant): string {
  return `Time's up! It is ${formatWallClockTime(target.time)}.`;
}

async function emit(writer: Writer, chunk: string): Promise<void> {
  try {
    await writer.write(chunk);
  } catch (error) {
    throw toIoError(error);
  }
}

/**
 * Renders the time left until `target`.
 *
 * In print-once mode the status line is written once. In live mode the line
 * is redrawn in place after every `tickMs` sleep until the remaining time
 * reaches zero, and is then replaced by the completion line. A tick that wakes
 * before the remaining whole seconds drop skips its redraw. The sleep is the
 * only suspension point; interrupting the loop is left to the process.
 *
 * @throws IoError when the writer fails
 */
export async function runCountdown(
  target: TargetInstant,
  mode: Mode,
  options: CountdownOptions,
): Promise<ExitSignal> {
  const {
    writer,
    now = () => new Date(),
    sleep = (ms: number) => delay(ms),
    style = 'clock',
    tickMs = TICK_INTERVAL_MS,
  } = options;

  if (mode === 'print-once') {
    const current = now();
    const line = statusLine(target, remainingDuration(target, current), style, relativeDay(target.instant, current));
    await emit(writer, `${line}\n`);
    return DONE;
  }

  let lastRendered = Number.POSITIVE_INFINITY;
  while (true) {
    const current = now();
    const remaining = remainingDuration(target, current);
    if (isElapsed(remaining)) {
      await emit(writer, `${REDRAW}${completionLine(target)}\n`);
      return DONE;
    }
    const seconds = totalSeconds(remaining);
    if (seconds < lastRendered) {
      lastRendered = seconds;
      await emit(writer, `${REDRAW}${statusLine(target, remaining, style, relativeDay(target.instant, current))}`);
    }
    await sleep(tickMs);
  }
}
