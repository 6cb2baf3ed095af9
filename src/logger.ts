import type { Logger } from './types.js';

export const LOG_PREFIX = '[rootpack]';

export function createConsoleLogger(opts?: { debug?: boolean }): Logger {
  const debug = opts?.debug ?? false;
  return {
    info(message) {
      console.log(message);
    },
    debug(message, data) {
      if (!debug) return;
      if (data) console.debug(LOG_PREFIX, message, data);
      else console.debug(LOG_PREFIX, message);
    },
    error(message, data) {
      if (data) console.error(message, data);
      else console.error(message);
    },
  };
}
