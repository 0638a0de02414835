/**
 * File logger
 * The terminal belongs to the UI, so every line goes to the log file only
 */

import * as fs from 'fs'
import config from '@/helpers/env'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string, error?: unknown): void
}

let logFile = config.MURMUR_LOG_FILE
let threshold: LogLevel = parseLevel(config.MURMUR_LOG_LEVEL)

function parseLevel(value: string): LogLevel {
  return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info'
}

/**
 * Redirect or disable logging (empty path disables)
 */
export function configureLogger(options: { file?: string; level?: LogLevel }): void {
  if (options.file !== undefined) logFile = options.file
  if (options.level) threshold = options.level
}

export function formatLogLine(level: LogLevel, scope: string, message: string, date = new Date()): string {
  return `[${date.toISOString()}] ${level.toUpperCase().padEnd(5)} [${scope}] ${message}`
}

function write(level: LogLevel, scope: string, message: string): void {
  if (!logFile || LEVELS[level] < LEVELS[threshold]) return
  try {
    fs.appendFileSync(logFile, formatLogLine(level, scope, message) + '\n')
  } catch {
    // Ignore
  }
}

/**
 * Create a logger whose lines are tagged with the given scope
 */
export function createLogger(scope: string): Logger {
  return {
    debug: (message) => write('debug', scope, message),
    info: (message) => write('info', scope, message),
    warn: (message) => write('warn', scope, message),
    error: (message, error) => {
      const detail = error === undefined ? '' : `: ${error instanceof Error ? error.message : String(error)}`
      write('error', scope, message + detail)
    },
  }
}
