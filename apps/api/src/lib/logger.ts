// ============================================
// Logger
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER
}

function currentLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

function clock() {
  return new Date().toISOString().split('T')[1].split('.')[0]
}

function enabled(level: LogLevel) {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()]
}

export type Logger = {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string, error?: unknown) => void
}

/**
 * Scoped console logger: `[12:04:55] [votes] message`.
 *
 * `LOG_LEVEL` is read on every call so tests and scripts can change it at
 * runtime.
 */
export function createLogger(scope: string): Logger {
  const prefix = () => `[${clock()}] [${scope}]`
  return {
    debug(message) {
      if (enabled('debug')) console.debug(`${prefix()} ${message}`)
    },
    info(message) {
      if (enabled('info')) console.log(`${prefix()} ${message}`)
    },
    warn(message) {
      if (enabled('warn')) console.warn(`${prefix()} ${message}`)
    },
    error(message, error) {
      if (!enabled('error')) return
      if (error === undefined) {
        console.error(`${prefix()} ${message}`)
        return
      }
      console.error(`${prefix()} ${message}`, error)
    },
  }
}

export function log(message: string) {
  if (enabled('info')) console.log(`[${clock()}] ${message}`)
}
