/**
 * Logger utility for nandfs
 *
 * Namespaced console loggers for the engine, the storage backends and the CLI.
 * The threshold comes from `NANDFS_LOG_LEVEL` (debug, info, warn, error, silent);
 * `NANDFS_DEBUG=1` is shorthand for `debug`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
  /** Derive a logger whose prefix is extended with `scope` */
  child: (scope: string) => Logger
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER
}

/**
 * Resolve the active threshold from the environment.
 */
export function resolveLogLevel(env: Record<string, string | undefined> = readEnv()): LogLevel {
  const configured = env.NANDFS_LOG_LEVEL?.toLowerCase()
  if (configured && isLogLevel(configured)) {
    return configured
  }
  return env.NANDFS_DEBUG ? 'debug' : 'info'
}

function readEnv(): Record<string, string | undefined> {
  return typeof process !== 'undefined' && process.env ? process.env : {}
}

/**
 * Create a namespaced logger instance.
 *
 * @param prefix - Prefix to prepend to all log messages (e.g., '[nandfs-cli]')
 * @param level - Threshold; defaults to the environment's
 *
 * @example
 * ```typescript
 * const log = createLogger('[nandfs-cli]')
 * log.info('formatting')            // [nandfs-cli] formatting
 * log.child('host').warn('slow')    // [nandfs-cli:host] slow
 * ```
 */
export function createLogger(prefix: string, level: LogLevel = resolveLogLevel()): Logger {
  const enabled = (wanted: LogLevel) => LEVEL_ORDER[wanted] >= LEVEL_ORDER[level]

  return {
    info: (...args: unknown[]) => {
      if (enabled('info')) console.info(prefix, ...args)
    },
    warn: (...args: unknown[]) => {
      if (enabled('warn')) console.warn(prefix, ...args)
    },
    error: (...args: unknown[]) => {
      if (enabled('error')) console.error(prefix, ...args)
    },
    debug: (...args: unknown[]) => {
      if (enabled('debug')) console.debug(prefix, ...args)
    },
    child: (scope: string) => {
      const base = prefix.endsWith(']') ? prefix.slice(0, -1) : prefix
      return createLogger(prefix.endsWith(']') ? `${base}:${scope}]` : `${base}:${scope}`, level)
    },
  }
}

/**
 * Default logger instance with [nandfs] prefix
 */
export const logger: Logger = createLogger('[nandfs]')
