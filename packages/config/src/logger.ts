/**
 * Structured logging.
 *
 * Emits one JSON line per entry with:
 * - timestamp, level, scope, message and any extra fields
 *
 * Lines go to stdout by default so any log aggregator that reads JSON from
 * stdout can pick them up. Entries below the configured level are dropped.
 */

import { settings } from './settings'
import type { LogLevel } from './settings'

export type LogFields = Record<string, string | number | boolean | null>

export interface LogEntry extends LogFields {
  ts: string
  level: Exclude<LogLevel, 'silent'>
  scope: string
  msg: string
}

/** Destination for serialized log lines. */
export type LogSink = (line: string) => void

export interface Logger {
  readonly scope: string
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  now?: () => Date
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line + '\n')
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? settings.logLevel]
  const sink = options.sink ?? stdoutSink
  const now = options.now ?? (() => new Date())

  const emit = (level: LogEntry['level'], msg: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < threshold) return
    const entry: LogEntry = { ...fields, ts: now().toISOString(), level, scope, msg }
    sink(JSON.stringify(entry))
  }

  return {
    scope,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  }
}
