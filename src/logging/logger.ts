/**
 * Logger configuration.
 *
 * metric-weaver logs through a single global logger. The transformer reports
 * each rewritten declaration at debug level and the runtime reports metrics
 * sink failures as warnings. Users inject their own implementation to route
 * these messages elsewhere.
 */

import type { Logger } from './types.js'

/**
 * Default logger implementation.
 *
 * Only logs warnings and errors to console. Debug and info are no-ops.
 */
const defaultLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
}

/**
 * Global logger instance.
 */
export let logger: Logger = defaultLogger

/**
 * Configures the global logger.
 *
 * @param customLogger - The logger implementation to use
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import { configureLogging } from 'metric-weaver'
 *
 * configureLogging(pino({ level: 'debug' }))
 * ```
 */
export function configureLogging(customLogger: Logger): void {
  logger = customLogger
}

/**
 * Restores the console-backed default logger.
 */
export function resetLogging(): void {
  logger = defaultLogger
}
