/**
 * @papercode/logger
 *
 * Structured logging for the paper-code harvesting tools.
 *
 * - JSON output (machine-parseable) or pretty output (colored, human-readable)
 * - ISO 8601 timestamps
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with inherited component path and context
 *
 * Level and format are process-wide settings. Applications call
 * `configureLogging()` once at startup with values from their config layer.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogFormat = 'json' | 'pretty'

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

/**
 * Receives every entry that passes the level filter, already formatted.
 */
export type LogSink = (level: LogLevel, line: string, entry: LogEntry) => void

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

export interface LoggingSettings {
  level: LogLevel
  format: LogFormat
  sink: LogSink
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line)
      break
    case 'info':
      console.info(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'error':
    case 'fatal':
      console.error(line)
      break
  }
}

function defaultSettings(): LoggingSettings {
  return {
    level: 'info',
    format: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
    sink: consoleSink,
  }
}

let settings: LoggingSettings = defaultSettings()

export function configureLogging(overrides: Partial<LoggingSettings>): void {
  settings = { ...settings, ...overrides }
}

export function resetLogging(): void {
  settings = defaultSettings()
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[settings.level]
}

export function formatError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) return undefined

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component
    ? `${entry.service}:${entry.component}`
    : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''

  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger.
   * A string extends the component path (`pipeline:checkpoint`); an object
   * adds default context to every entry.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext

  constructor(service: string, component?: string, defaultContext: LogContext = {}) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    const errorData = formatError(error)
    if (errorData) {
      entry.error = errorData
    }

    const line = settings.format === 'json' ? formatJson(entry) : formatPretty(entry)
    settings.sink(level, line, entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext === 'object') {
      return new Logger(this.service, this.component, {
        ...this.defaultContext,
        ...componentOrContext,
      })
    }

    const newComponent = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(this.service, newComponent, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * import { createLogger } from '@papercode/logger'
 *
 * const logger = createLogger('crawler')
 * logger.info('Run started', { sourceId: 'cvpr2025' })
 *
 * const fetchLogger = logger.child('fetch')
 * fetchLogger.warn('Fetch attempt failed', { attempt: 1 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}

/**
 * Logger that drops everything. Used where a logger is optional.
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined,
  child: () => silentLogger,
}
