import { ParseError, type TimeField } from '../errors.js';
import { HOUR_RANGE, HOURS_PER_HALF_DAY, MINUTE_RANGE, SECOND_RANGE } from './constants.js';
import { clockFieldSchema, createWallClockTime, type WallClockTime } from './wallClock.js';

/**
 * The clock part: everything up to the first whitespace or letter.
 */
const CLOCK_PART = /^[^\sa-z]*/i;

const DIGITS = /^\d+$/;

const FIELDS = [
  { field: 'hour', range: HOUR_RANGE },
  { field: 'minute', range: MINUTE_RANGE },
  { field: 'second', range: SECOND_RANGE },
] as const satisfies readonly { field: TimeField; range: { min: number; max: number } }[];

type Meridiem = 'am' | 'pm';

/**
 * Parses a time of day.
 *
 * Accepted forms (case-insensitive, surrounding whitespace ignored):
 * - `H`, `H:MM`, `H:MM:SS`: 24-hour clock, omitted fields are zero
 * - any of the above followed by `am` or `pm`, optionally after a space
 *
 * Numeric fields may be zero-padded. With am/pm, `12am` is midnight and
 * `12pm` is noon; an hour above 12 together with am/pm is rejected as
 * overconstrained.
 *
 * @param text - The time expression as typed
 * @returns The parsed time on the 24-hour clock
 * @throws ParseError naming the offending field and its span in `text`
 *
 * @example
 * parseWallClockTime('9')       // { hour: 9, minute: 0, second: 0 }
 * parseWallClockTime('9:30pm')  // { hour: 21, minute: 30, second: 0 }
 * parseWallClockTime('12 AM')   // { hour: 0, minute: 0, second: 0 }
 */
export function parseWallClockTime(text: string): WallClockTime {
  const body = text.trim();
  if (body === '') {
    throw new ParseError(text, { kind: 'empty' });
  }
  const offset = text.indexOf(body);

  const clock = CLOCK_PART.exec(body)?.[0] ?? '';
  if (clock === '') {
    throw new ParseError(text, {
      kind: 'invalid-format',
      field: 'time',
      span: { start: offset, end: offset + body.length },
    });
  }

  const parts = clock.split(':');
  if (parts.length > FIELDS.length) {
    throw new ParseError(text, {
      kind: 'invalid-format',
      field: 'time',
      span: { start: offset, end: offset + clock.length },
    });
  }

  const values = [0, 0, 0];
  let position = offset;
  parts.forEach((part, index) => {
    const { field, range } = FIELDS[index];
    const span = { start: position, end: position + part.length };
    position = span.end + 1;

    if (part === '') {
      throw new ParseError(text, { kind: 'incomplete', field, span });
    }
    if (!DIGITS.test(part)) {
      throw new ParseError(text, { kind: 'invalid-format', field, span });
    }
    const value = Number(part);
    if (!clockFieldSchema(range).safeParse(value).success) {
      throw new ParseError(text, { kind: 'out-of-range', field, span, ...range });
    }
    values[index] = value;
  });

  const [hour, minute, second] = values;
  const rest = body.slice(clock.length);
  const suffix = rest.trimStart();
  if (suffix === '') {
    return createWallClockTime(hour, minute, second);
  }

  const suffixStart = offset + clock.length + (rest.length - suffix.length);
  const meridiemSpan = { start: suffixStart, end: suffixStart + suffix.length };
  const meridiem = toMeridiem(suffix);
  if (meridiem === undefined) {
    throw new ParseError(text, { kind: 'invalid-format', field: 'am/pm', span: meridiemSpan });
  }
  if (hour > HOURS_PER_HALF_DAY) {
    throw new ParseError(text, {
      kind: 'overconstrained',
      hour: { start: offset, end: offset + parts[0].length },
      meridiem: meridiemSpan,
    });
  }

  return createWallClockTime(to24Hour(hour, meridiem), minute, second);
}

function toMeridiem(suffix: string): Meridiem | undefined {
  const lower = suffix.toLowerCase();
  return lower === 'am' || lower === 'pm' ? lower : undefined;
}

function to24Hour(hour: number, meridiem: Meridiem): number {
  const base = hour % HOURS_PER_HALF_DAY;
  return meridiem === 'pm' ? base + HOURS_PER_HALF_DAY : base;
}
