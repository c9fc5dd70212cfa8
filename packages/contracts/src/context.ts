/**
 * Reconciliation Context
 *
 * Services the platform hands to code running inside a reconciliation pass.
 */

/**
 * Structured logger.
 * Use this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
