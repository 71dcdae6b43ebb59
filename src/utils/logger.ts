/**
 * Logger utility for sharedbloom
 *
 * The library logs nothing by default. Call setLogger() with consoleLogger,
 * a level-filtered console logger, or an adapter to your own logger.
 *
 * @module utils/logger
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

/**
 * Console logger that drops messages below `minLevel`
 */
export function createConsoleLogger(minLevel: LogLevel = 'debug'): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) console.debug(`[DEBUG] ${message}`, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) console.info(`[INFO] ${message}`, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (!enabled('error')) return
      if (error !== undefined) {
        console.error(`[ERROR] ${message}`, error, ...args)
      } else {
        console.error(`[ERROR] ${message}`, ...args)
      }
    },
  }
}

export const consoleLogger: Logger = createConsoleLogger('debug')

export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Global logger instance, noop until setLogger() is called
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, createConsoleLogger } from 'sharedbloom'
 *
 * setLogger(createConsoleLogger('info'))
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
