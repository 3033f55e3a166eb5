/**
 * Logging for the deferred mint ledger.
 *
 * Plain console output with a timestamp, level and scope prefix. The default
 * level comes from DEFERRED_MINT_LOG_LEVEL.
 */

import { LOG_LEVEL_ENV } from './constants.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

export interface LoggerOptions {
  level?: LogLevel
  clock?: () => string
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  return isLogLevel(value) ? value : fallback
}

const safeFormat = (val: unknown): unknown => {
  if (typeof val === 'object' && val !== null && !(val instanceof Error)) {
    try {
      return JSON.stringify(val, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))
    } catch {
      return '[unserializable object]'
    }
  }
  return val
}

/**
 * Create a logger for one scope (usually a class or file name).
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel(process.env[LOG_LEVEL_ENV])
  const clock = options.clock ?? (() => new Date().toISOString())
  const threshold = LEVEL_ORDER[level]

  const emit = (messageLevel: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void => {
    if (LEVEL_ORDER[messageLevel] < threshold) return
    const line = `[${clock()}] [${messageLevel}] [${scope}] ${message}`
    const formatted = args.map(safeFormat)
    switch (messageLevel) {
      case 'error':
        console.error(line, ...formatted)
        break
      case 'warn':
        console.warn(line, ...formatted)
        break
      default:
        console.log(line, ...formatted)
    }
  }

  return {
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args)
  }
}
