/**
 * Structured logging.
 *
 * Emits one JSON line per event with timestamp, level, scope and message,
 * plus any extra fields. Zero external dependencies: the sink decides where
 * the line goes (browser console, process stdio, or a test buffer).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Ordered from most to least verbose. */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal']

export type LogFields = Record<string, unknown>

export type LogSink = (level: LogLevel, line: string) => void

export interface Logger {
  readonly scope: string
  readonly level: LogLevel
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  fatal(msg: string, fields?: LogFields): void
  /** Logger for a sub-scope (`parent:child`) sharing level and sink. */
  child(scope: string): Logger
}

export interface LoggerOptions {
  scope: string
  level?: LogLevel
  sink?: LogSink
  clock?: () => Date
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value)
}

/** Parse a level name (case-insensitive), falling back when unset or unknown. */
export function parseLogLevel(value: unknown, fallback: LogLevel = 'info'): LogLevel {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : value
  return isLogLevel(normalized) ? normalized : fallback
}

// Error instances stringify to {} so they are flattened first.
function serializeField(value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message }
  return value
}

/** Browser sink: routes each level to the matching console method. */
export const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line)
      break
    case 'info':
      console.info(line)
      break
    case 'warn':
      console.warn(line)
      break
    default:
      console.error(line)
  }
}

/** Node sink: error and fatal go to stderr, the rest to stdout. */
export const stdioSink: LogSink = (level, line) => {
  const stream = level === 'error' || level === 'fatal' ? process.stderr : process.stdout
  stream.write(line + '\n')
}

export function createLogger(options: LoggerOptions): Logger {
  const level = options.level ?? 'info'
  const sink = options.sink ?? consoleSink
  const clock = options.clock ?? (() => new Date())
  const threshold = LOG_LEVELS.indexOf(level)

  const emit = (entryLevel: LogLevel, msg: string, fields?: LogFields): void => {
    if (LOG_LEVELS.indexOf(entryLevel) < threshold) return
    const entry: LogFields = { ts: clock().toISOString(), level: entryLevel, scope: options.scope, msg }
    if (fields) {
      for (const [key, value] of Object.entries(fields)) {
        if (!Object.hasOwn(entry, key)) entry[key] = serializeField(value)
      }
    }
    sink(entryLevel, JSON.stringify(entry))
  }

  return {
    scope: options.scope,
    level,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    fatal: (msg, fields) => emit('fatal', msg, fields),
    child: (scope) => createLogger({ ...options, level, scope: `${options.scope}:${scope}` }),
  }
}
