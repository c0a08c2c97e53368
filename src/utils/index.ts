/**
 * Utilities
 */

// Logger
export { createLogger, getLogger, resolveLoggerSettings, LOG_DESTINATION } from './logger.js'

// Mime types
export { parseMimeType, guessMimeType } from './mime.js'
export type { ParsedMimeType } from './mime.js'
export type { LoggerSettings } from './logger.js'
