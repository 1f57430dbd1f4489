import fs from 'node:fs'
import util from 'node:util'
import pino from 'pino'

const getTimezone = (): string => {
  if (process.env.TZ) {
    return process.env.TZ
  }
  try {
    return fs.readFileSync('/etc/timezone', 'utf8').trim()
  } catch {
    // macOS has no /etc/timezone, the zone is in the /etc/localtime symlink
    try {
      const match = fs.readlinkSync('/etc/localtime').match(/zoneinfo\/(.*)/)
      if (match) {
        return match[1]
      }
    } catch {
      // fall through to UTC
    }
    return 'UTC'
  }
}

const timeZone = getTimezone()

const baseLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  timestamp: () =>
    `,"time":"${new Date().toLocaleString(undefined, {
      timeZone,
    })}"`,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
    },
  },
})

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  info: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
}

const children: pino.Logger[] = []

const stringifyArgs = (args: unknown[]): string => {
  return args
    .map((arg) => {
      if (arg instanceof Error) {
        return arg.message
      }
      if (typeof arg === 'object' && arg !== null) {
        return util.inspect(arg, { colors: true, depth: null })
      }
      return String(arg)
    })
    .join(' ')
}

/**
 * Change the level of every logger, including the ones already handed out.
 * Used at startup when `logging.debug` is enabled.
 */
export const setLogLevel = (level: LogLevel) => {
  baseLogger.level = level
  for (const child of children) {
    child.level = level
  }
}

const createLogger = (name: string): Logger => {
  const logger = baseLogger.child({
    name: name.toUpperCase(),
  })
  children.push(logger)

  return {
    info: (...args: unknown[]) => logger.info(stringifyArgs(args)),
    error: (...args: unknown[]) => logger.error(stringifyArgs(args)),
    warn: (...args: unknown[]) => logger.warn(stringifyArgs(args)),
    debug: (...args: unknown[]) => logger.debug(stringifyArgs(args)),
  }
}

export default createLogger
