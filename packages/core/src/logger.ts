/**
 * @module logger
 * Console-backed {@link Logger} with a bracketed component prefix,
 * e.g. `[DocumentService] Save failed`.
 */

import type { Logger } from '@layerkit/types';

/** Create a logger that writes to the console with a `[prefix]` tag. */
export function consoleLogger(prefix: string): Logger {
  const tag = `[${prefix}]`;
  return {
    debug: (message, ...details) => console.debug(tag, message, ...details),
    info: (message, ...details) => console.info(tag, message, ...details),
    warn: (message, ...details) => console.warn(tag, message, ...details),
    error: (message, ...details) => console.error(tag, message, ...details),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
