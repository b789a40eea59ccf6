/**
 * @fileoverview Structured logging utility.
 *
 * Library code takes a {@link Logger} as an option and defaults to
 * {@link noopLogger}. Entries are plain objects; the default handler writes
 * them as JSON lines to the console, while the CLI renders them as readable
 * text on its error stream (see {@link formatLogLine}).
 *
 * @module utils/logger
 *
 * @example
 * ```typescript
 * import { createLogger, LogLevel } from './utils/logger'
 *
 * const logger = createLogger({ component: 'checkout', minLevel: LogLevel.DEBUG })
 * logger.info('Reconciled working directory', { written: 3, removed: 1 })
 *
 * const repoLogger = logger.child({ workingDir: '/tmp/project' })
 * repoLogger.debug('Wrote file', { path: 'a.txt' })  // Includes workingDir
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

export interface LogEntry {
  /** ISO-8601 timestamp */
  timestamp: string
  level: LogLevel
  message: string
  component?: string
  error?: {
    name: string
    message: string
    /** Taxonomy code of a repository error */
    code?: string
    stack?: string
  }
  /** Logger context merged with per-call data */
  data?: Record<string, unknown>
}

export type LogHandler = (entry: LogEntry) => void

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, error?: Error, data?: Record<string, unknown>): void
  /**
   * Logger whose entries also carry `context`.
   */
  child(context: Record<string, unknown>): Logger
}

export interface LoggerOptions {
  component?: string
  /** Minimum level to emit (default: INFO) */
  minLevel?: LogLevel
  /** Data included in every entry */
  context?: Record<string, unknown>
  /** Where entries go (default: JSON lines on the console) */
  handler?: LogHandler
}

// ============================================================================
// Handlers
// ============================================================================

function consoleHandler(entry: LogEntry): void {
  const output = JSON.stringify(entry)

  switch (entry.level) {
    case LogLevel.DEBUG:
      console.debug(output)
      break
    case LogLevel.INFO:
      console.info(output)
      break
    case LogLevel.WARN:
      console.warn(output)
      break
    case LogLevel.ERROR:
      console.error(output)
      break
  }
}

/**
 * One line of text for an entry: level, component, message, then each data
 * field as `key=<json>` and the error summary.
 *
 * @example
 * formatLogLine(entry)
 * // 'warn [checkout] Checkout refused paths=["a.txt"]'
 */
export function formatLogLine(entry: LogEntry): string {
  const parts: string[] = [entry.level]
  if (entry.component) {
    parts.push(`[${entry.component}]`)
  }
  parts.push(entry.message)

  for (const [key, value] of Object.entries(entry.data ?? {})) {
    parts.push(`${key}=${JSON.stringify(value)}`)
  }
  if (entry.error) {
    const code = entry.error.code ? ` (${entry.error.code})` : ''
    parts.push(`error=${entry.error.name}${code}: ${entry.error.message}`)
  }

  return parts.join(' ')
}

/**
 * Handler that writes {@link formatLogLine} output to a single sink, e.g.
 * the CLI's stderr.
 */
export function createLineHandler(write: (line: string) => void): LogHandler {
  return (entry) => write(formatLogLine(entry))
}

// ============================================================================
// Logger Implementation
// ============================================================================

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

class StructuredLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly context: Record<string, unknown>,
    private readonly handler: LogHandler,
    private readonly component?: string
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, message, undefined, data)
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, message, undefined, data)
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, message, undefined, data)
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, message, error, data)
  }

  child(context: Record<string, unknown>): Logger {
    return new StructuredLogger(this.minLevel, { ...this.context, ...context }, this.handler, this.component)
  }

  private emit(level: LogLevel, message: string, error?: Error, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message }
    if (this.component) {
      entry.component = this.component
    }
    if (error) {
      const code = errorCode(error)
      entry.error = {
        name: error.name,
        message: error.message,
        ...(code !== undefined && { code }),
        ...(error.stack !== undefined && { stack: error.stack }),
      }
    }

    const merged = { ...this.context, ...data }
    if (Object.keys(merged).length > 0) {
      entry.data = merged
    }

    this.handler(entry)
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new StructuredLogger(
    options.minLevel ?? LogLevel.INFO,
    options.context ?? {},
    options.handler ?? consoleHandler,
    options.component
  )
}

/**
 * Logger that discards everything.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
}
