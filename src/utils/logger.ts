/**
 * Logging for matching runs
 * @module utils/logger
 */

/**
 * Structured values attached to a log message
 */
export type LogContext = Record<string, unknown>

/**
 * Logger accepted by the matcher. Pipeline counts go to `debug`,
 * decision summaries to `info`.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

export type LogLevel = keyof Logger

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped (default: 'info') */
  level?: LogLevel
}

/**
 * Creates a logger writing `[LEVEL] message` lines to the console.
 * Warnings and errors go to `console.warn` and `console.error`, the rest to
 * `console.log`. The context, when given, follows the line as a second argument.
 *
 * @example
 * ```typescript
 * const matcher = Matcher.builder()
 *   .fields({ last: new JaroWinklerSimilarity() })
 *   .logger(createConsoleLogger({ level: 'debug' }))
 *   .deduplicate(people)
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info']

  const write = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < threshold) return
    const line = `[${level.toUpperCase()}] ${message}`
    const sink =
      level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    if (context === undefined) sink(line)
    else sink(line, context)
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  }
}

/**
 * Console logger at info level. `printDecision` writes here when the
 * matcher has no logger of its own.
 */
export const consoleLogger: Logger = createConsoleLogger()

/**
 * Logger that drops everything; the matcher's default for pipeline messages.
 */
export function createSilentLogger(): Logger {
  const noop = (): void => {}
  return { debug: noop, info: noop, warn: noop, error: noop }
}

/**
 * Wraps a logger so that every message starts with `[scope]`.
 */
export function createPrefixedLogger(scope: string, base: Logger): Logger {
  const tag = (message: string): string => `[${scope}] ${message}`
  return {
    debug: (message, context) => base.debug(tag(message), context),
    info: (message, context) => base.info(tag(message), context),
    warn: (message, context) => base.warn(tag(message), context),
    error: (message, context) => base.error(tag(message), context),
  }
}
