/**
 * Structured logging.
 *
 * Emits one JSON line per event with:
 * - ts (ISO-8601), level, event name, and any bound or per-call fields
 *
 * Lines go to stdout by default so any aggregator reading JSON from stdout
 * picks them up; tests pass their own sink.
 */

import type { LogLevel } from '@pa-trend/shared'

export type LogFields = Record<string, unknown>
export type LogSink = (line: string) => void

export interface Logger {
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
  /** A logger that adds `bindings` to every entry. */
  child(bindings: LogFields): Logger
}

export interface LoggerOptions {
  /** Entries below this level are dropped (default 'info') */
  level?: LogLevel
  sink?: LogSink
  bindings?: LogFields
  clock?: () => Date
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line + '\n')
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  const sink = options.sink ?? stdoutSink
  const bindings = options.bindings ?? {}
  const clock = options.clock ?? (() => new Date())

  const emit = (entryLevel: LogLevel, event: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) return
    const entry = {
      ts: clock().toISOString(),
      level: entryLevel,
      event,
      ...bindings,
      ...fields,
    }
    sink(JSON.stringify(entry))
  }

  return {
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
    child: (extra) => createLogger({ level, sink, clock, bindings: { ...bindings, ...extra } }),
  }
}
