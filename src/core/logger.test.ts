import { describe, it, expect, vi, afterEach } from 'vitest'
import { Logger } from './logger'

describe('Logger', () => {
  const saved = process.env.LOG_LEVEL

  afterEach(() => {
    vi.restoreAllMocks()
    if (saved === undefined) delete process.env.LOG_LEVEL
    else process.env.LOG_LEVEL = saved
  })

  it('prints the raw error after the error line at the default level', () => {
    delete process.env.LOG_LEVEL
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:80')

    new Logger('FreeboxPlugin').error('Router unreachable', cause)

    expect(spy).toHaveBeenCalledTimes(2)
    expect(spy.mock.calls[0][0]).toMatch(/^\[.+\] \[ERROR\] \[FreeboxPlugin\] Router unreachable$/)
    expect(spy.mock.calls[1][0]).toBe(cause)
  })

  it('drops lines below the threshold', () => {
    process.env.LOG_LEVEL = 'error'
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})

    const logger = new Logger('SessionManager')
    logger.warn('Cached session expired')
    logger.info('Login submitted')

    expect(spy).not.toHaveBeenCalled()
  })
})
