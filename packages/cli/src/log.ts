/**
 * Stderr logging for the CLI. The core never logs; user-facing errors are
 * written once, as is, and debug lines only appear under --verbose.
 */

export type LogLevel = 'debug' | 'error';

export interface Logger {
  debug(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose: boolean;
  /** Clock for debug timestamps */
  now?: () => Date;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Local time of day with milliseconds, e.g. "08:00:00.000".
 */
export function formatLogTimestamp(date: Date): string {
  return `${pad(date.getHours(), 2)}:${pad(date.getMinutes(), 2)}:${pad(date.getSeconds(), 2)}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * Creates a logger writing whole lines through `write`.
 *
 * - debug: `[08:00:00.000] · message`, only when verbose
 * - error: the message unchanged
 */
export function createLogger(write: (text: string) => void, options: LoggerOptions): Logger {
  const now = options.now ?? (() => new Date());

  function log(level: LogLevel, message: string): void {
    switch (level) {
      case 'debug':
        if (options.verbose) {
          write(`[${formatLogTimestamp(now())}] · ${message}\n`);
        }
        break;
      case 'error':
        write(`${message}\n`);
        break;
    }
  }

  return {
    debug: (message) => log('debug', message),
    error: (message) => log('error', message),
  };
}
