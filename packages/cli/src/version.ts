/**
 * Reads the CLI version from its package manifest.
 */
import { createRequire } from 'node:module';
import { z } from 'zod';

const require = createRequire(import.meta.url);

const manifestSchema = z.object({
  version: z.string().min(1),
});

export function readVersion(): string {
  return manifestSchema.parse(require('../package.json')).version;
}
