/**
 * Logger Utility
 *
 * pino logger writing to stderr, so log lines never mix with output a
 * renderer writes to stdout. Debug entries only appear when `LOG_LEVEL`
 * asks for them.
 */

import pino from 'pino'

/** File descriptor every log line goes to */
export const LOG_DESTINATION = 2

export interface LoggerSettings {
  level: string
  pretty: boolean
}

/**
 * Derive logger settings from the environment
 */
export function resolveLoggerSettings(env: NodeJS.ProcessEnv): LoggerSettings {
  return {
    level: env.LOG_LEVEL ?? 'info',
    pretty: env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test',
  }
}

function createBaseLogger(settings: LoggerSettings): pino.Logger {
  if (settings.pretty) {
    return pino({
      level: settings.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: LOG_DESTINATION,
        },
      },
    })
  }
  return pino({ level: settings.level }, pino.destination(LOG_DESTINATION))
}

const baseLogger = createBaseLogger(resolveLoggerSettings(process.env))

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): pino.Logger {
  return baseLogger.child({ component })
}

/**
 * Get the base logger
 */
export function getLogger(): pino.Logger {
  return baseLogger
}
