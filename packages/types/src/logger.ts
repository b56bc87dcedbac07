/**
 * @module logger
 * Minimal logging contract accepted by services.
 */

/** Leveled logger. Implementations prefix messages with their component name. */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}
