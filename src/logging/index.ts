/**
 * Logging module exports.
 */

export { logger, configureLogging, resetLogging } from './logger.js'
export type { Logger } from './types.js'
