import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createLogger, withRequestContext, getRequestContext } from '../index'

function lastJsonLine(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const calls = spy.mock.calls
  const line = calls[calls.length - 1]?.[0]
  return JSON.parse(String(line))
}

describe('@partsense/logger', () => {
  beforeEach(() => {
    vi.stubEnv('LOG_FORMAT', 'json')
    vi.stubEnv('LOG_LEVEL', 'info')
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it('writes JSON entries with service, level and metadata', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})

    createLogger('api').info('Server started', { port: 8000 })

    const entry = lastJsonLine(info)
    expect(entry.service).toBe('api')
    expect(entry.level).toBe('info')
    expect(entry.message).toBe('Server started')
    expect(entry.port).toBe(8000)
    expect(entry.component).toBeUndefined()
  })

  it('drops entries below LOG_LEVEL', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})

    createLogger('api').debug('noisy detail')

    expect(debug).not.toHaveBeenCalled()
  })

  it('joins component names for nested child loggers', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    createLogger('api').child('search').child('ranker').warn('Low scores')

    expect(lastJsonLine(warn).component).toBe('search:ranker')
  })

  it('merges object context passed to child()', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})

    createLogger('api').child({ userId: 'user-1' }).info('Profile built')

    expect(lastJsonLine(info).userId).toBe('user-1')
  })

  it('serializes errors with name and message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    createLogger('api').error('Catalog failed', {}, new TypeError('bad payload'))

    const entry = lastJsonLine(error)
    expect(entry.error).toMatchObject({ name: 'TypeError', message: 'bad payload' })
  })

  it('includes request context fields inside withRequestContext', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const log = createLogger('api')

    withRequestContext({ requestId: 'req-42' }, () => {
      expect(getRequestContext()?.requestId).toBe('req-42')
      log.info('Inside request')
    })

    expect(lastJsonLine(info).requestId).toBe('req-42')
    expect(getRequestContext()).toBeUndefined()
  })
})
