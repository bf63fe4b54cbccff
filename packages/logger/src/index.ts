/**
 * @cardledger/logger
 *
 * Structured logging shared by the cardledger workspaces.
 *
 * - JSON lines in production, colored single lines in development
 * - ISO 8601 timestamps, `service:component` paths
 * - Child loggers inherit component path and context
 * - Optional redaction of credentials (proxy URLs, control-plane secrets, DSNs)
 *
 * Environment variables:
 * - LOG_LEVEL: debug | info | warn | error | fatal (default: info)
 * - LOG_FORMAT: json | pretty (default: json in production, pretty otherwise)
 * - LOG_REDACT: "false" disables redaction (default: enabled)
 * - LOG_DESTINATION: console | stderr (default: console). Commands whose
 *   stdout is data send every entry to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogDestination = 'console' | 'stderr'

export interface LogContext {
  [key: string]: unknown
}

interface LogEntry {
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

export const REDACTED = '[REDACTED]'

/** Context keys whose values are never written out while redaction is on */
const SECRET_KEYS = new Set(['secret', 'password', 'token', 'authorization', 'databaseUrl', 'redisUrl'])

/** Matches `scheme://user:pass@` so credentials inside URLs can be masked */
const URL_CREDENTIALS = /(\b[a-z][a-z0-9+.-]*:\/\/)[^\s/@:]+:[^\s/@]+@/gi

let levelOverride: LogLevel | null = null
let redactionOverride: boolean | null = null
let destinationOverride: LogDestination | null = null

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

/**
 * Force a minimum level regardless of LOG_LEVEL. Pass null to go back to the environment.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

export function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

export function setRedactionEnabled(enabled: boolean | null): void {
  redactionOverride = enabled
}

function isRedactionEnabled(): boolean {
  if (redactionOverride !== null) return redactionOverride
  return process.env.LOG_REDACT?.toLowerCase() !== 'false'
}

export function setLogDestination(destination: LogDestination | null): void {
  destinationOverride = destination
}

function getLogDestination(): LogDestination {
  if (destinationOverride) return destinationOverride
  return process.env.LOG_DESTINATION?.toLowerCase() === 'stderr' ? 'stderr' : 'console'
}

function getLogFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

/**
 * Mask `user:password@` in any URL embedded in a string.
 */
export function redactUrlCredentials(value: string): string {
  return value.replace(URL_CREDENTIALS, `$1${REDACTED}@`)
}

function redactValue(key: string, value: unknown): unknown {
  if (SECRET_KEYS.has(key)) {
    return value === undefined || value === null || value === '' ? value : REDACTED
  }
  if (typeof value === 'string') {
    return redactUrlCredentials(value)
  }
  return value
}

function redactContext(meta: LogContext): LogContext {
  const result: LogContext = {}
  for (const [key, value] of Object.entries(meta)) {
    result[key] = redactValue(key, value)
  }
  return result
}

function formatError(error: unknown): LogEntry['error'] {
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

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)
  const componentPath = entry.component ? `${entry.service}:${entry.component}` : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack ?? error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

function output(entry: LogEntry): void {
  const formatted = getLogFormat() === 'json' ? JSON.stringify(entry) : formatPretty(entry)

  if (getLogDestination() === 'stderr') {
    process.stderr.write(`${formatted}\n`)
    return
  }

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
  /**
   * Child logger. A string extends the component path (`downloader:fetch`),
   * an object only adds default context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component?: string,
    private readonly defaultContext: LogContext = {}
  ) {}

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!shouldLog(level)) return

    const context = { ...this.defaultContext, ...meta }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...(isRedactionEnabled() ? redactContext(context) : context),
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined) {
      const formatted = formatError(error)
      entry.error =
        isRedactionEnabled() && formatted
          ? { ...formatted, message: redactUrlCredentials(formatted.message) }
          : formatted
    }

    output(entry)
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
    const component = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, component, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service
 *
 * @example
 * ```ts
 * const logger = createLogger('downloader')
 * logger.info('Run started', { mode: 'resume' })
 *
 * const pool = logger.child('proxy-pool')
 * pool.warn('Route flagged unhealthy', { routeId: 'hk-01' })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
