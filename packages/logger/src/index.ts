/**
 * @campuswatch/logger
 *
 * Structured logging shared by the collector and the API.
 *
 * - JSON lines in production, colored single lines in development
 * - ISO 8601 timestamps
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers carry a component path and inherited context
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level (default: info)
 * - LOG_FORMAT: json | pretty (default: json when NODE_ENV=production, else pretty)
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

export type LogSink = (level: LogLevel, line: string) => void

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BOLD = '\x1b[1m'

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
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

export function serializeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  return { name: 'NonError', message: String(error) }
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, error, ...meta } = entry
  const scope = component ? `${service}:${component}` : service
  const metaText = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorText = error ? `\n  ${DIM}${error.stack ?? error.message}${RESET}` : ''

  return (
    `${DIM}${timestamp}${RESET} ${LEVEL_COLORS[level]}${BOLD}${level.toUpperCase().padEnd(5)}${RESET}` +
    ` ${DIM}[${scope}]${RESET} ${message}${metaText}${errorText}`
  )
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line)
      return
    case 'info':
      console.info(line)
      return
    case 'warn':
      console.warn(line)
      return
    case 'error':
    case 'fatal':
      console.error(line)
      return
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * A string extends the component path (`collector:pipeline`); an object only adds
   * context fields.
   */
  child(componentOrContext: string | LogContext, context?: LogContext): ILogger
}

export interface LoggerOptions {
  component?: string
  context?: LogContext
  /** Defaults to the console; tests pass a collecting sink. */
  sink?: LogSink
  env?: NodeJS.ProcessEnv
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly context: LogContext
  private readonly sink: LogSink
  private readonly env: NodeJS.ProcessEnv

  constructor(service: string, options: LoggerOptions = {}) {
    this.service = service
    this.component = options.component
    this.context = options.context ?? {}
    this.sink = options.sink ?? consoleSink
    this.env = options.env ?? process.env
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

  child(componentOrContext: string | LogContext, context: LogContext = {}): ILogger {
    if (typeof componentOrContext !== 'string') {
      return new Logger(this.service, {
        component: this.component,
        context: { ...this.context, ...componentOrContext },
        sink: this.sink,
        env: this.env,
      })
    }

    return new Logger(this.service, {
      component: this.component ? `${this.component}:${componentOrContext}` : componentOrContext,
      context: { ...this.context, ...context },
      sink: this.sink,
      env: this.env,
    })
  }

  private write(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveLogLevel(this.env)]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.context,
      ...meta,
    }
    if (this.component) entry.component = this.component
    if (error !== undefined) entry.error = serializeError(error)

    const line = resolveLogFormat(this.env) === 'json' ? formatJson(entry) : formatPretty(entry)
    this.sink(level, line)
  }
}

/**
 * @example
 * ```ts
 * const logger = createLogger('collector')
 * logger.child('pipeline').info('Run finished', { saved: 3 })
 * ```
 */
export function createLogger(service: string, options?: LoggerOptions): ILogger {
  return new Logger(service, options)
}
