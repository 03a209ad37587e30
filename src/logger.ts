/**
 * Looseleaf Logging
 * =================
 *
 * Level-filtered console output shared by every module of the library.
 * A logger is created once per store from the configured `logLevel` and
 * handed to the models, the cache manager and the request client.
 */

// =============================================================================
// LOG LEVELS
// =============================================================================

/**
 * Verbosity levels, from silent to verbose.
 */
export type LogLevel = 'none' | 'error' | 'warning' | 'info' | 'debug'

const LEVEL_RANK: Record<LogLevel, number> = {
  none: 0,
  error: 1,
  warning: 2,
  info: 3,
  debug: 4
}

const PREFIX = '[Looseleaf]'

// =============================================================================
// LOGGER
// =============================================================================

export interface Logger {
  readonly level: LogLevel
  error(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  debug(message: string, ...details: unknown[]): void
  enabled(level: Exclude<LogLevel, 'none'>): boolean
}

/**
 * The subset of `console` a logger writes to.
 */
export type LogSink = Pick<Console, 'error' | 'warn' | 'info' | 'debug'>

export function createLogger(level: LogLevel, sink: LogSink = console): Logger {
  const enabled = (target: Exclude<LogLevel, 'none'>) =>
    level !== 'none' && LEVEL_RANK[level] >= LEVEL_RANK[target]

  return {
    level,
    enabled,
    error: (message, ...details) => {
      if (enabled('error')) sink.error(`${PREFIX} ${message}`, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warning')) sink.warn(`${PREFIX} ${message}`, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) sink.info(`${PREFIX} ${message}`, ...details)
    },
    debug: (message, ...details) => {
      if (enabled('debug')) sink.debug(`${PREFIX} ${message}`, ...details)
    }
  }
}

/**
 * A logger that drops everything. Used by detached models.
 */
export const silentLogger: Logger = createLogger('none')
