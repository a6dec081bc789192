/**
 * Logging for detection runs
 * @module utils/logger
 */

/**
 * Severity of a log message
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type LogContext = Record<string, unknown>

/**
 * Logger accepted by the detector and the logger-backed log sink
 */
export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

type LogWriter = (level: LogLevel, message: string, context?: LogContext) => void

/**
 * Routes every level of a Logger through a single writer.
 * @internal
 */
function fromWriter(write: LogWriter): Logger {
  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  }
}

/**
 * Console logger. Debug and info go to stdout, warnings and errors to stderr.
 */
export const defaultLogger: Logger = fromWriter((level, message, context) => {
  const line = `[${level.toUpperCase()}] ${message}`
  switch (level) {
    case 'warn':
      console.warn(line, context ?? '')
      break
    case 'error':
      console.error(line, context ?? '')
      break
    default:
      console.log(line, context ?? '')
  }
})

/**
 * Logger that discards everything. The detector's default.
 */
export function createSilentLogger(): Logger {
  return fromWriter(() => {})
}

/**
 * Prefixes every message with `[name]`.
 */
export function createPrefixedLogger(name: string, baseLogger: Logger): Logger {
  return fromWriter((level, message, context) =>
    baseLogger[level](`[${name}] ${message}`, context)
  )
}

/**
 * Wraps a caller-supplied logger so that a failing write never interrupts a
 * detection run. Each failure is handed to `onFailure` instead of propagating.
 * `onFailure` must not log through the guarded logger.
 *
 * @example
 * ```typescript
 * const failures: unknown[] = []
 * const logger = createGuardedLogger(fileLogger, (error) => failures.push(error))
 * logger.info('Deduplicating 120 records') // never throws
 * ```
 */
export function createGuardedLogger(
  baseLogger: Logger,
  onFailure: (error: unknown, level: LogLevel) => void
): Logger {
  return fromWriter((level, message, context) => {
    try {
      baseLogger[level](message, context)
    } catch (error) {
      onFailure(error, level)
    }
  })
}
