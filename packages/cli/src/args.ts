import { z } from 'zod';

/**
 * The command line could not be understood (unknown option, no time given).
 */
export class UsageError extends Error {
  readonly name = 'UsageError';
}

/**
 * Schema for the options of a countdown run.
 */
export const cliOptionsSchema = z.object({
  /** Time expression, positional words joined by a space */
  time: z.string(),
  mode: z.enum(['print-once', 'live']),
  style: z.enum(['clock', 'words']),
  verbose: z.boolean(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

/**
 * What the command line asks for.
 */
export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; options: CliOptions };

type Flag = 'update' | 'words' | 'verbose' | 'help' | 'version';

const FLAGS: Record<string, Flag> = {
  '-u': 'update',
  '--update': 'update',
  '-w': 'words',
  '--words': 'words',
  '-v': 'verbose',
  '--verbose': 'verbose',
  '-h': 'help',
  '--help': 'help',
  '-V': 'version',
  '--version': 'version',
};

/**
 * Negative numbers are times (and rejected as such), not options.
 */
const NEGATIVE_NUMBER = /^-\d/;

const SHORT_FLAG_GROUP = /^-[a-zA-Z]{2,}$/;

/**
 * Parses `argv` (without the node and script paths).
 *
 * Short flags can be grouped (`-uw`) and `--` ends option parsing.
 * `--help` and `--version` win over everything else.
 *
 * @throws UsageError for an unknown option or a missing time
 *
 * @example
 * parseCliArgs(['9:30', 'pm', '-u'])
 * // { kind: 'run', options: { time: '9:30 pm', mode: 'live', style: 'clock', verbose: false } }
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const flags = new Set<Flag>();
  const positionals: string[] = [];
  let optionsEnded = false;

  for (const token of argv) {
    if (optionsEnded || !token.startsWith('-') || token === '-' || NEGATIVE_NUMBER.test(token)) {
      positionals.push(token);
      continue;
    }
    if (token === '--') {
      optionsEnded = true;
      continue;
    }

    const names = SHORT_FLAG_GROUP.test(token)
      ? token.slice(1).split('').map((letter) => `-${letter}`)
      : [token];
    for (const name of names) {
      const flag = FLAGS[name];
      if (flag === undefined) {
        throw new UsageError(`unknown option '${name}'`);
      }
      flags.add(flag);
    }
  }

  if (flags.has('help')) {
    return { kind: 'help' };
  }
  if (flags.has('version')) {
    return { kind: 'version' };
  }
  if (positionals.length === 0) {
    throw new UsageError('missing TIME argument');
  }

  const options = cliOptionsSchema.parse({
    time: positionals.join(' '),
    mode: flags.has('update') ? 'live' : 'print-once',
    style: flags.has('words') ? 'words' : 'clock',
    verbose: flags.has('verbose'),
  });
  return { kind: 'run', options };
}
