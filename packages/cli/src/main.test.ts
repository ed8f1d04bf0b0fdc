import { describe, it, expect } from 'vitest';
import { REDRAW, type Writer } from '@untilclock/core';
import { main, EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, type CliIo } from './main.js';
import { helpText } from './help.js';

interface FakeIo extends CliIo {
  out: string[];
  err: string[];
  sleeps: number[];
}

/**
 * Process surface with a clock that only moves when the countdown sleeps.
 */
function fakeIo(start: Date, stdout?: Writer): FakeIo {
  let current = start.getTime();
  const out: string[] = [];
  const err: string[] = [];
  const sleeps: number[] = [];
  return {
    out,
    err,
    sleeps,
    stdout: stdout ?? {
      async write(chunk: string) {
        out.push(chunk);
      },
    },
    stderr: (text) => {
      err.push(text);
    },
    now: () => new Date(current),
    sleep: async (ms) => {
      sleeps.push(ms);
      current += ms;
    },
  };
}

const EIGHT_AM = new Date(2024, 0, 15, 8, 0, 0);

describe('main', () => {
  it('prints the time left once', async () => {
    const io = fakeIo(EIGHT_AM);
    expect(await main(['9'], io)).toBe(EXIT_SUCCESS);
    expect(io.out).toEqual(['01:00:00 until 9:00am today\n']);
    expect(io.err).toEqual([]);
  });

  it('accepts the marker as a separate word', async () => {
    const io = fakeIo(EIGHT_AM);
    expect(await main(['6', 'pm'], io)).toBe(EXIT_SUCCESS);
    expect(io.out).toEqual(['10:00:00 until 6:00pm today\n']);
  });

  it('writes the time left in words', async () => {
    const io = fakeIo(EIGHT_AM);
    await main(['--words', '11:12'], io);
    expect(io.out).toEqual(['3 hours 12 minutes until 11:12am today\n']);
  });

  it('counts down live and exits 0 at the target', async () => {
    const io = fakeIo(new Date(2024, 0, 15, 8, 59, 58));
    expect(await main(['-u', '9'], io)).toBe(EXIT_SUCCESS);
    expect(io.out).toEqual([
      `${REDRAW}00:00:02 until 9:00am today`,
      `${REDRAW}00:00:01 until 9:00am today`,
      `${REDRAW}Time's up! It is 9:00am.\n`,
    ]);
    expect(io.sleeps).toEqual([1000, 1000]);
  });

  it('reports an unreadable time on stderr only', async () => {
    const io = fakeIo(EIGHT_AM);
    expect(await main(['abc'], io)).toBe(EXIT_FAILURE);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([
      'error: Invalid format, expected a time\n  abc\n  ^^^ could not make sense of this\n',
    ]);
  });

  it('reports out-of-range fields', async () => {
    const io = fakeIo(EIGHT_AM);
    expect(await main(['24:00'], io)).toBe(EXIT_FAILURE);
    expect(io.err).toEqual([
      'error: hour field is out of range\n  24:00\n  ^^ this is not in the proper range (0..23) for hour\n',
    ]);
  });

  it('reports a negative hour as a time error', async () => {
    const io = fakeIo(EIGHT_AM);
    expect(await main(['-5'], io)).toBe(EXIT_FAILURE);
    expect(io.err).toEqual(['error: hour field has an invalid format\n  -5\n  ^^ hour has an invalid format\n']);
  });

  it('exits 1 when stdout cannot be written', async () => {
    const io = fakeIo(EIGHT_AM, {
      write: async () => {
        throw new Error('EPIPE');
      },
    });
    expect(await main(['9'], io)).toBe(EXIT_FAILURE);
    expect(io.err).toEqual(['error: Failed to write to the terminal: EPIPE\n']);
  });

  it('exits 2 on an unknown option', async () => {
    const io = fakeIo(EIGHT_AM);
    expect(await main(['--bogus', '9'], io)).toBe(EXIT_USAGE);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([
      "error: unknown option '--bogus'\nUsage: till [options] <time...>\nRun 'till --help' for more information.\n",
    ]);
  });

  it('exits 2 without a time', async () => {
    const io = fakeIo(EIGHT_AM);
    expect(await main([], io)).toBe(EXIT_USAGE);
    expect(io.err[0].split('\n')[0]).toBe('error: missing TIME argument');
  });

  it('prints help', async () => {
    const io = fakeIo(EIGHT_AM);
    expect(await main(['--help'], io)).toBe(EXIT_SUCCESS);
    expect(io.out).toEqual([helpText()]);
  });

  it('prints the package version', async () => {
    const io = fakeIo(EIGHT_AM);
    expect(await main(['-V'], io)).toBe(EXIT_SUCCESS);
    expect(io.out).toEqual(['0.1.0\n']);
  });

  it('logs the resolved target under --verbose', async () => {
    const io = fakeIo(EIGHT_AM);
    await main(['-v', '9:30pm'], io);
    expect(io.err).toEqual([
      '[08:00:00.000] · resolved "9:30pm" to 9:30pm today\n',
      '[08:00:00.000] · mode print-once, clock style\n',
    ]);
    expect(io.out).toEqual(['13:30:00 until 9:30pm today\n']);
  });
});
