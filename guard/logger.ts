/**
 * Prefixed logger
 */

import type { Logger } from "./types.js";

export const LOG_PREFIX = "[privacy-guard]";

export function createLogger(baseLogger: Logger = console): Logger {
  return {
    info: (msg: string) => baseLogger.info(`${LOG_PREFIX} ${msg}`),
    warn: (msg: string) => baseLogger.warn(`${LOG_PREFIX} ${msg}`),
    error: (msg: string) => baseLogger.error(`${LOG_PREFIX} ${msg}`),
    debug: (msg: string) => baseLogger.debug?.(`${LOG_PREFIX} ${msg}`),
  };
}
