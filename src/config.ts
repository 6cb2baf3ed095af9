import { isAbsolute, resolve } from 'node:path';
import { describeIssues, roundtripOptionsSchema } from './schema.js';
import { RoundtripError } from './shared/errors.js';
import type { RoundtripConfig } from './types.js';

export const DEFAULT_FILE = 'polynomial.json';

/**
 * Validate path options and resolve the document's absolute location.
 * There are no flags or environment variables: callers pass options directly.
 */
export function resolveConfig(options: { file?: string; cwd?: string; debug?: boolean } = {}): RoundtripConfig {
  const parsed = roundtripOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new RoundtripError('BAD_INPUT', 'Invalid round-trip options', { issues: describeIssues(parsed.error) });
  }
  const file = parsed.data.file ?? DEFAULT_FILE;
  const cwd = parsed.data.cwd ?? process.cwd();
  return {
    path: isAbsolute(file) ? file : resolve(cwd, file),
    debug: parsed.data.debug ?? false,
  };
}
