import { LOG_PREFIX } from '../constants';

import type { Logger } from '../types';

/**
 * Console-backed logger, used when the coordinator has to report something
 * and no logger was injected.
 */
/* eslint-disable no-console */
export function createConsoleLogger(prefix: string = LOG_PREFIX): Logger {
  return {
    debug: (msg, ...args) => console.debug(`${prefix} ${msg}`, ...args),
    info: (msg, ...args) => console.info(`${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix} ${msg}`, ...args),
  };
}
/* eslint-enable no-console */
