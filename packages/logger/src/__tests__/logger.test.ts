import { describe, it, expect } from 'vitest'
import { createLogger, parseLogLevel, type LogLevel } from '../logger'

function capture() {
  const lines: { level: LogLevel; line: string }[] = []
  const sink = (level: LogLevel, line: string) => {
    lines.push({ level, line })
  }
  return { lines, sink }
}

const clock = () => new Date('2026-01-02T03:04:05.000Z')

describe('createLogger', () => {
  it('emits one JSON line per event', () => {
    const { lines, sink } = capture()
    const log = createLogger({ scope: 'demo', sink, clock })

    log.info('started', { surface: 'renderCanvas' })

    expect(lines).toHaveLength(1)
    expect(lines[0]?.level).toBe('info')
    expect(lines[0]?.line).toBe(
      '{"ts":"2026-01-02T03:04:05.000Z","level":"info","scope":"demo","msg":"started","surface":"renderCanvas"}',
    )
  })

  it('drops events below the minimum level', () => {
    const { lines, sink } = capture()
    const log = createLogger({ scope: 'demo', level: 'warn', sink, clock })

    log.debug('a')
    log.info('b')
    log.warn('c')
    log.fatal('d')

    expect(lines.map((l) => l.level)).toEqual(['warn', 'fatal'])
  })

  it('defaults to info', () => {
    const { lines, sink } = capture()
    const log = createLogger({ scope: 'demo', sink, clock })

    log.debug('hidden')

    expect(log.level).toBe('info')
    expect(lines).toHaveLength(0)
  })

  it('flattens Error fields to name and message', () => {
    const { lines, sink } = capture()
    const log = createLogger({ scope: 'demo', sink, clock })

    log.error('boom', { err: new TypeError('bad input') })

    const entry = JSON.parse(lines[0]?.line ?? '{}')
    expect(entry.err).toEqual({ name: 'TypeError', message: 'bad input' })
  })

  it('does not let fields overwrite reserved keys', () => {
    const { lines, sink } = capture()
    const log = createLogger({ scope: 'demo', sink, clock })

    log.info('kept', { msg: 'replaced', level: 'fatal' })

    const entry = JSON.parse(lines[0]?.line ?? '{}')
    expect(entry.msg).toBe('kept')
    expect(entry.level).toBe('info')
  })

  it('keeps fields named like Object.prototype members', () => {
    const { lines, sink } = capture()
    const log = createLogger({ scope: 'demo', sink, clock })

    log.info('inherited names', { constructor: 'ctor', toString: 'str' })

    const entry = JSON.parse(lines[0]?.line ?? '{}')
    expect(entry.constructor).toBe('ctor')
    expect(entry.toString).toBe('str')
  })

  it('child loggers nest scope and share level and sink', () => {
    const { lines, sink } = capture()
    const log = createLogger({ scope: 'demo', level: 'debug', sink, clock }).child('startup')

    log.debug('step')

    expect(log.scope).toBe('demo:startup')
    expect(JSON.parse(lines[0]?.line ?? '{}').scope).toBe('demo:startup')
  })
})

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively', () => {
    expect(parseLogLevel('WARN')).toBe('warn')
    expect(parseLogLevel(' debug ')).toBe('debug')
  })

  it('falls back for unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBe('info')
    expect(parseLogLevel(undefined, 'error')).toBe('error')
    expect(parseLogLevel(3)).toBe('info')
  })
})
