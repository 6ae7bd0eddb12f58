/**
 * Logging types for metric-weaver.
 */

/**
 * Logger interface.
 *
 * Compatible with standard logging libraries like Pino, Winston, and console.
 */
export interface Logger {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}
