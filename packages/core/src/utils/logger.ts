import fs from 'node:fs'
import path from 'node:path'
import type { Logger } from '@metaeval/types'
import winston from 'winston'

export type { Logger } from '@metaeval/types'

const logDir = process.env.LOG_DIR || 'logs'

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json(),
)

// Define console format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}] ${String(message)}`
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`
    }
    return msg
  }),
)

let rootLogger: winston.Logger | undefined

/**
 * Shared winston logger, created on first use so importing this module has no side effects
 */
function getRootLogger(): winston.Logger {
  if (rootLogger) {
    return rootLogger
  }

  // Create log directory if it doesn't exist
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true })
  }

  rootLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
      }),
      // File transport for all logs
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      // File transport for errors
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
    ],
  })
  return rootLogger
}

/**
 * Create a logger tagged with the component it belongs to
 */
export function createLogger(component: string): Logger {
  const child = getRootLogger().child({ component })
  return {
    debug: (message, context) => child.debug(message, context ?? {}),
    info: (message, context) => child.info(message, context ?? {}),
    warn: (message, context) => child.warn(message, context ?? {}),
    error: (message, context) => child.error(message, context ?? {}),
  }
}

/**
 * Flush and close every transport. Call before the process exits.
 */
export function closeLoggers(): void {
  rootLogger?.close()
  rootLogger = undefined
}

/**
 * No-op logger for testing
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

/**
 * Flatten an unknown thrown value for log context
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
