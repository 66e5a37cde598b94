/**
 * Logger utility using Pino for structured logging
 *
 * Usage:
 *   import { logger } from './logger'
 *   logger.info({ key: 'value' }, 'Message')
 *   logger.debug('Debug message')
 *   logger.warn({ property: 'city' }, 'Warning message')
 */

import pino, { type Logger, type LoggerOptions } from 'pino'

// Determine log level from environment variable (default: INFO)
const logLevel: string = process.env.DEBUG ? 'debug' : (process.env.LOG_LEVEL ?? 'info')

const options: LoggerOptions = { level: logLevel }

// The pretty transport runs in a worker thread; test runs log through plain JSON instead
if (process.env.NODE_ENV !== 'test') {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  }
}

// Create base logger with pino
const pinoLogger: Logger = pino(options)

export interface LogContext {
  service?: string
  module?: string
  requestId?: string
  [key: string]: unknown
}

/**
 * Create a scoped logger with context tags
 */
export function createLogger(context: LogContext): Logger {
  return pinoLogger.child(context)
}

/**
 * Default logger instance
 */
export const logger: Logger = pinoLogger

export type { Logger }
