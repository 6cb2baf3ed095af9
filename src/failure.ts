import { toRoundtripError } from './shared/errors.js';
import type { Logger } from './types.js';

/**
 * Log a failed run as `rootpack: CODE: message` and return the process exit
 * status for it.
 */
export function reportFailure(err: unknown, logger: Logger): number {
  const e = toRoundtripError(err);
  logger.error(`rootpack: ${e.code}: ${e.message}`, e.details);
  return e.exitCode;
}
