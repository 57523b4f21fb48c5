/**
 * Structured logging.
 *
 * Emits one JSON line per entry with timestamp, level, scope and message,
 * plus any extra fields. Writes to stdout unless another writer is given.
 */

import type { LogLevel } from './schemas/timers'

export type LogFields = Record<string, unknown>

export interface LogWriter {
  write(chunk: string): unknown
}

export interface Logger {
  readonly level: LogLevel
  readonly scope: string
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  /** Logger sharing level and writer, with `scope` appended to this one's. */
  child(scope: string): Logger
}

export interface LoggerOptions {
  scope?: string
  level?: LogLevel
  writer?: LogWriter
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export const DEFAULT_LOG_SCOPE = 'smarttimers'

export function createLogger(options: LoggerOptions = {}): Logger {
  const scope = options.scope ?? DEFAULT_LOG_SCOPE
  const level = options.level ?? 'info'
  const writer = options.writer ?? process.stdout
  const threshold = SEVERITY[level]

  const emit = (entryLevel: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields): void => {
    if (SEVERITY[entryLevel] < threshold) return
    const entry = {
      ts: new Date().toISOString(),
      level: entryLevel,
      scope,
      msg,
      ...fields,
    }
    writer.write(JSON.stringify(entry) + '\n')
  }

  return {
    level,
    scope,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (childScope) => createLogger({ scope: `${scope}:${childScope}`, level, writer }),
  }
}
