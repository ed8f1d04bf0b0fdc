import {
  IoError,
  ParseError,
  formatWallClockTime,
  renderParseError,
  resolve,
  runCountdown,
  toIoError,
  type Writer,
} from '@untilclock/core';
import { parseCliArgs, UsageError, type CliCommand } from './args.js';
import { helpText, USAGE } from './help.js';
import { createLogger, type Logger } from './log.js';
import { readVersion } from './version.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Process surface the CLI runs against. Only `stdout` and `stderr` are
 * required; the clock and sleep default to the real ones.
 */
export interface CliIo {
  stdout: Writer;
  stderr: (text: string) => void;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs the CLI and returns the process exit code.
 * Parse and write failures are reported on stderr and give exit code 1;
 * a bad command line gives 2. Anything else is rethrown.
 */
export async function main(argv: readonly string[], io: CliIo): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`error: ${error.message}\n${USAGE}\nRun 'till --help' for more information.\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const now = io.now ?? (() => new Date());
  const logger = createLogger(io.stderr, {
    verbose: command.kind === 'run' && command.options.verbose,
    now,
  });

  try {
    switch (command.kind) {
      case 'help':
        await writeOrFail(io.stdout, helpText());
        return EXIT_SUCCESS;
      case 'version':
        await writeOrFail(io.stdout, `${readVersion()}\n`);
        return EXIT_SUCCESS;
      case 'run': {
        const { time, mode, style } = command.options;
        const target = resolve(time, now());
        logger.debug(`resolved "${time}" to ${formatWallClockTime(target.time)} ${target.day}`);
        logger.debug(`mode ${mode}, ${style} style`);
        const signal = await runCountdown(target, mode, {
          writer: io.stdout,
          now,
          sleep: io.sleep,
          style,
        });
        return signal.code;
      }
    }
  } catch (error) {
    return reportFailure(error, logger);
  }
}

async function writeOrFail(writer: Writer, text: string): Promise<void> {
  try {
    await writer.write(text);
  } catch (error) {
    throw toIoError(error);
  }
}

function reportFailure(error: unknown, logger: Logger): number {
  if (error instanceof ParseError) {
    logger.error(renderParseError(error));
    return EXIT_FAILURE;
  }
  if (error instanceof IoError) {
    logger.error(`error: ${error.message}`);
    return EXIT_FAILURE;
  }
  throw error;
}
