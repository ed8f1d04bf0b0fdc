import { toIoError, type IoError } from '../errors.js';

/**
 * Destination for countdown output.
 * A rejected write is fatal to the run.
 */
export interface Writer {
  write(chunk: string): Promise<void>;
}

/**
 * Adapts a Node writable stream (usually `process.stdout`).
 *
 * Each write resolves once the chunk is flushed and rejects with IoError when
 * the stream reports an error for it. Once the stream has emitted 'error',
 * every later write rejects with that error.
 */
export function streamWriter(stream: NodeJS.WritableStream): Writer {
  let failure: IoError | undefined;
  stream.on('error', (error: unknown) => {
    failure = toIoError(error);
  });

  return {
    write(chunk: string): Promise<void> {
      return new Promise((resolve, reject) => {
        if (failure !== undefined) {
          reject(failure);
          return;
        }
        try {
          stream.write(chunk, (error) => {
            if (error) {
              reject(toIoError(error));
            } else {
              resolve();
            }
          });
        } catch (error) {
          reject(toIoError(error));
        }
      });
    },
  };
}
