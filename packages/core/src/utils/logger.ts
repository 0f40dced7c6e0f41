import type { Logger } from '@tradeloop/shared'
import fs from 'node:fs'
import path from 'node:path'
import winston from 'winston'
import type TransportStream from 'winston-transport'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

export interface LoggerOptions {
  readonly level: LogLevel
  /** Directory for the append-only log files; omit for console only */
  readonly logDir?: string
  /** Mirror log lines to stdout */
  readonly console?: boolean
}

/**
 * Errors do not survive JSON.stringify, so flatten them first
 */
function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const serialized: Record<string, unknown> = { name: value.name, message: value.message }
    if (value.cause !== undefined) {
      serialized.cause = serializeValue(value.cause)
    }
    return serialized
  }
  return value
}

export function serializeContext(context: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(context)) {
    out[key] = serializeValue(value)
  }
  return out
}

/**
 * Single-line, level-tagged rendering shared by the console and file transports
 */
export function formatLogLine(info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, component, ...metadata } = info
  const scope = typeof component === 'string' ? ` [${component}]` : ''
  let line = `${String(timestamp)} [${level.toUpperCase()}]${scope} ${String(message)}`
  if (Object.keys(metadata).length > 0) {
    line += ` ${JSON.stringify(metadata)}`
  }
  return line
}

const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(formatLogLine)
)

/**
 * Logger backed by winston. Child loggers tag every line with a component.
 */
export class WinstonLogger implements Logger {
  constructor(private readonly target: winston.Logger) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.target.debug(message, context ? serializeContext(context) : {})
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.target.info(message, context ? serializeContext(context) : {})
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.target.warn(message, context ? serializeContext(context) : {})
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.target.error(message, context ? serializeContext(context) : {})
  }

  child(component: string): Logger {
    return new WinstonLogger(this.target.child({ component }))
  }
}

/**
 * Build the process logger: append-only files under `logDir` mirrored to stdout
 */
export function createLogger(options: LoggerOptions, extraTransports: TransportStream[] = []): Logger {
  const transports: TransportStream[] = [...extraTransports]

  if (options.console ?? true) {
    transports.push(new winston.transports.Console())
  }

  if (options.logDir) {
    fs.mkdirSync(options.logDir, { recursive: true })
    transports.push(
      new winston.transports.File({
        filename: path.join(options.logDir, 'trading.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(options.logDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    )
  }

  const logger = winston.createLogger({
    level: options.level,
    format: lineFormat,
    transports,
  })

  return new WinstonLogger(logger)
}
