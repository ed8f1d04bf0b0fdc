/**
 * Error types surfaced by the resolver and the countdown driver.
 * Every error is fatal to a run; nothing here is retried.
 */

/**
 * Part of a time expression an error points at.
 */
export type TimeField = 'time' | 'hour' | 'minute' | 'second' | 'am/pm';

/**
 * Half-open character range [start, end) into the offending input.
 */
export interface TextSpan {
  readonly start: number;
  readonly end: number;
}

/**
 * Reason a time expression was rejected (discriminated on `kind`).
 */
export type ParseFailure =
  | { readonly kind: 'empty' }
  | { readonly kind: 'incomplete'; readonly field: TimeField; readonly span: TextSpan }
  | { readonly kind: 'invalid-format'; readonly field: TimeField; readonly span: TextSpan }
  | {
      readonly kind: 'out-of-range';
      readonly field: TimeField;
      readonly span: TextSpan;
      readonly min: number;
      readonly max: number;
    }
  | { readonly kind: 'overconstrained'; readonly hour: TextSpan; readonly meridiem: TextSpan };

/**
 * Headline for a parse failure, e.g. "minute field is out of range".
 */
export function describeParseFailure(failure: ParseFailure): string {
  switch (failure.kind) {
    case 'empty':
      return 'Expected a time, got an empty string';
    case 'incomplete':
      return `${failure.field} field is incomplete`;
    case 'invalid-format':
      return failure.field === 'time' ? 'Invalid format, expected a time' : `${failure.field} field has an invalid format`;
    case 'out-of-range':
      return `${failure.field} field is out of range`;
    case 'overconstrained':
      return 'Time is overconstrained';
  }
}

/**
 * A time expression that does not match the accepted grammar or whose
 * numeric fields are out of range. `input` is the text exactly as given.
 */
export class ParseError extends Error {
  readonly name = 'ParseError';

  constructor(
    readonly input: string,
    readonly failure: ParseFailure,
  ) {
    super(`Invalid time "${input}": ${describeParseFailure(failure)}`);
  }
}

/**
 * Writing to the terminal failed.
 */
export class IoError extends Error {
  readonly name = 'IoError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Wraps anything thrown by a writer as an IoError, passing IoErrors through.
 */
export function toIoError(error: unknown): IoError {
  if (error instanceof IoError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new IoError(`Failed to write to the terminal: ${detail}`, { cause: error });
}

function underline(span: TextSpan, label: string): string {
  const width = Math.max(1, span.end - span.start);
  return `  ${' '.repeat(span.start)}${'^'.repeat(width)} ${label}`;
}

/**
 * Renders a parse error for the terminal: the headline, the input, and a
 * caret line under each offending span.
 *
 * @example
 * renderParseError(new ParseError('9:60', failure))
 * // error: minute field is out of range
 * //   9:60
 * //     ^^ this is not in the proper range (0..59) for minute
 */
export function renderParseError(error: ParseError): string {
  const { input, failure } = error;
  const lines = [`error: ${describeParseFailure(failure)}`];

  switch (failure.kind) {
    case 'empty':
      break;
    case 'incomplete':
      lines.push(`  ${input}`, underline(failure.span, `${failure.field} is missing`));
      break;
    case 'invalid-format':
      lines.push(
        `  ${input}`,
        underline(
          failure.span,
          failure.field === 'time' ? 'could not make sense of this' : `${failure.field} has an invalid format`,
        ),
      );
      break;
    case 'out-of-range':
      lines.push(
        `  ${input}`,
        underline(
          failure.span,
          `this is not in the proper range (${failure.min}..${failure.max}) for ${failure.field}`,
        ),
      );
      break;
    case 'overconstrained':
      lines.push(
        `  ${input}`,
        underline(failure.hour, 'this is already 24-hour'),
        underline(failure.meridiem, 'so this is too much information'),
      );
      break;
  }

  return lines.join('\n');
}
