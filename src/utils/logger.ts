/**
 * Logger Utility
 *
 * Pino logger with pretty-print in development and silence under test.
 * Everything goes to stderr so CLI output on stdout stays machine-readable.
 */

import pino from 'pino'

const env = process.env.NODE_ENV
const isTest = env === 'test'
const isPretty = env !== 'production' && !isTest

const level = process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'info')

/**
 * Base logger instance
 */
const baseLogger: pino.Logger = isPretty
  ? pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino({ level }, pino.destination(2))

const children = new Set<pino.Logger>()

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): pino.Logger {
  const child = baseLogger.child({ component })
  children.add(child)
  return child
}

/**
 * Get the base logger
 */
export function getLogger(): pino.Logger {
  return baseLogger
}

/**
 * Change the level of the base logger and of every component logger
 */
export function setLogLevel(next: pino.LevelWithSilent): void {
  baseLogger.level = next
  for (const child of children) {
    child.level = next
  }
}
