export type LogLevel = "debug" | "info" | "warn" | "error"

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in levels
}

const envLevel = process.env.TRACKER_LOG_LEVEL
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info"

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function format(message: string, data?: Record<string, unknown>): string {
  const formatted = data ? `${message} ${JSON.stringify(data)}` : message
  return `[tracker] ${formatted}`
}

export function log(message: string, data?: Record<string, unknown>): void {
  if (levels[currentLevel] > levels.info) return
  console.log(format(message, data))
}

export function logDebug(message: string, data?: Record<string, unknown>): void {
  if (levels[currentLevel] > levels.debug) return
  console.debug(format(message, data))
}

export function logWarn(message: string, data?: Record<string, unknown>): void {
  if (levels[currentLevel] > levels.warn) return
  console.warn(format(message, data))
}

export function logError(message: string, data?: Record<string, unknown>): void {
  console.error(format(message, data))
}
