import type { Logger, LogLevel } from './types.js'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

let muted = false
let minLevel: LogLevel = 'info'

export function setLoggerMuted(value: boolean): void {
  muted = value
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level
}

function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
  if (muted) return
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return
  const payload = {
    ts: new Date().toISOString(),
    level: level.toUpperCase(),
    event,
    ...(data ?? {})
  }
  // stdout belongs to the interactive shell
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(payload))
}

/** Simple JSON logger used across runtime modules. */
export const logger: Logger = {
  debug(event, data) {
    emit('debug', event, data)
  },
  info(event, data) {
    emit('info', event, data)
  },
  warn(event, data) {
    emit('warn', event, data)
  },
  error(event, data) {
    emit('error', event, data)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
