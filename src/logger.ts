/**
 * Logging
 *
 * Components log through an injected Logger. The console logger tags every
 * line with `[scope]` and filters below the configured level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type Logger = {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value)
}

export function createConsoleLogger(scope: string, opts: { level?: LogLevel } = {}): Logger {
  const min = LEVEL_RANK[opts.level ?? 'info']
  const prefix = `[${scope}]`

  function enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= min
  }

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details)
    },
    info(message, ...details) {
      if (enabled('info')) console.info(prefix, message, ...details)
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details)
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details)
    },
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}
