/**
 * @certwatch/logger
 *
 * Structured logging for the certwatch tooling.
 *
 * - JSON lines in production, colored single-line output in development
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers extend the component path and inherit context
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level (default: info)
 * - LOG_FORMAT: json | pretty (default: json when NODE_ENV=production)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

/** Receives every entry that passes the level filter. */
export type LogSink = (entry: LogEntry, formatted: string) => void

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

export function resolveLogFormat(env: NodeJS.ProcessEnv = process.env): 'json' | 'pretty' {
  const format = env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function serializeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  return { name: 'UnknownError', message: String(error) }
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, error, ...meta } = entry
  const color = LOG_COLORS[level]
  const path = component ? `${service}:${component}` : service
  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack ?? error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${level.toUpperCase().padEnd(5)}${RESET} ${DIM}[${path}]${RESET} ${message}${metaStr}${errorStr}`
}

function consoleSink(entry: LogEntry, formatted: string): void {
  switch (entry.level) {
    case 'debug':
      console.debug(formatted)
      break
    case 'info':
      console.info(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
    case 'fatal':
      console.error(formatted)
      break
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  child(component: string, context?: LogContext): ILogger
}

export interface LoggerOptions {
  component?: string
  context?: LogContext
  /** Overrides console output, mainly for tests. */
  sink?: LogSink
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly context: LogContext
  private readonly sink?: LogSink

  constructor(service: string, options: LoggerOptions = {}) {
    this.service = service
    this.component = options.component
    this.context = options.context ?? {}
    this.sink = options.sink
  }

  private write(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[resolveLogLevel()]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.context,
      ...meta,
    }
    if (this.component) {
      entry.component = this.component
    }
    if (error !== undefined) {
      entry.error = serializeError(error)
    }

    const formatted = resolveLogFormat() === 'json' ? formatJson(entry) : formatPretty(entry)
    ;(this.sink ?? consoleSink)(entry, formatted)
  }

  debug(message: string, meta?: LogContext): void {
    this.write('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.write('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.write('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.write('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.write('fatal', message, meta, error)
  }

  child(component: string, context: LogContext = {}): ILogger {
    return new Logger(this.service, {
      component: this.component ? `${this.component}:${component}` : component,
      context: { ...this.context, ...context },
      sink: this.sink,
    })
  }
}

/**
 * Create the root logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('maintainer')
 * logger.child('validator').info('Validation complete', { valid: 120 })
 * ```
 */
export function createLogger(service: string, options: Omit<LoggerOptions, 'component'> = {}): ILogger {
  return new Logger(service, options)
}
