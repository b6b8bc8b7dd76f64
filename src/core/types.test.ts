import { describe, it, expect } from 'vitest'
import { join } from 'path'
import { tmpdir } from 'os'
import { isMetricName, loadPluginConfig } from './types'
import { parseLogLevel } from './logger'

describe('loadPluginConfig', () => {
  it('applies defaults', () => {
    expect(loadPluginConfig({})).toEqual({
      baseUrl: 'http://mafreebox.freebox.fr',
      password: undefined,
      badPassMarker: 'name="password"',
      connectedLabel: 'Connecté',
      cookieFile: join(tmpdir(), 'munin-freebox-cookie.json'),
      pageFile: join(tmpdir(), 'munin-freebox-page.html'),
      timeoutMs: 2000,
      maxReauth: 3,
      cookieTtlHours: 24,
      userAgent: 'freebox-munin/1.0',
    })
  })

  it('reads overrides from the environment', () => {
    const config = loadPluginConfig({
      FREEBOX_URL: 'http://192.168.0.254/',
      FREEBOX_PASSWORD: 'test-secret',
      FREEBOX_COOKIE_FILE: '/var/lib/munin/freebox-cookie.json',
      FREEBOX_TIMEOUT_MS: '5000',
      FREEBOX_MAX_REAUTH: '1',
    })

    expect(config.baseUrl).toBe('http://192.168.0.254')
    expect(config.password).toBe('test-secret')
    expect(config.cookieFile).toBe('/var/lib/munin/freebox-cookie.json')
    expect(config.timeoutMs).toBe(5000)
    expect(config.maxReauth).toBe(1)
  })

  it('disables the scratch page with an empty path', () => {
    expect(loadPluginConfig({ FREEBOX_PAGE_FILE: '' }).pageFile).toBeNull()
  })

  it('falls back to defaults for invalid numbers', () => {
    const config = loadPluginConfig({ FREEBOX_TIMEOUT_MS: 'soon', FREEBOX_MAX_REAUTH: '-2' })
    expect(config.timeoutMs).toBe(2000)
    expect(config.maxReauth).toBe(3)
  })

  it('never allows fewer than one re-authentication', () => {
    expect(loadPluginConfig({ FREEBOX_MAX_REAUTH: '0' }).maxReauth).toBe(3)
    expect(loadPluginConfig({ FREEBOX_COOKIE_TTL_HOURS: '0' }).cookieTtlHours).toBe(0)
  })

  it('treats an empty password as missing', () => {
    expect(loadPluginConfig({ FREEBOX_PASSWORD: '' }).password).toBeUndefined()
  })
})

describe('isMetricName', () => {
  it('accepts known metrics only', () => {
    expect(isMetricName('snr')).toBe(true)
    expect(isMetricName('load')).toBe(false)
  })
})

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug')
  })

  it('defaults to warn', () => {
    expect(parseLogLevel(undefined)).toBe('warn')
    expect(parseLogLevel('verbose')).toBe('warn')
  })
})
