import { DateTime } from 'luxon'
import { LOG_LEVELS, LogLevel, resolveLogLevel } from './env'

export interface Logger {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string, error?: unknown) => void
}

function formatLog(level: LogLevel, source: string, message: string): string {
  const timestamp = DateTime.now().toFormat('yyyy-MM-dd HH:mm:ss')
  return `[${timestamp}] [${level.toUpperCase()}] [${source}] ${message}`
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.stack ?? `${error.name}: ${error.message}`
  return String(error)
}

// Everything goes to stderr; stdout is reserved for command output
export function createLogger(source: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LOG_LEVELS.indexOf(level)
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold
  return {
    debug: (message) => {
      if (enabled('debug')) console.error(formatLog('debug', source, message))
    },
    info: (message) => {
      if (enabled('info')) console.error(formatLog('info', source, message))
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(formatLog('warn', source, message))
    },
    error: (message, error) => {
      if (!enabled('error')) return
      console.error(formatLog('error', source, error === undefined ? message : `${message}\n${describe(error)}`))
    },
  }
}
