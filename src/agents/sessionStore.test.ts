import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { FileStateStore } from './sessionStore'

describe('FileStateStore', () => {
  let dir: string
  let cookieFile: string
  let pageFile: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'freebox-munin-test-'))
    cookieFile = join(dir, 'state', 'cookie.json')
    pageFile = join(dir, 'state', 'page.html')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('returns null when no session was saved', async () => {
    const store = new FileStateStore(cookieFile, pageFile)
    expect(await store.loadSession()).toBeNull()
  })

  it('reads back a saved session, creating the directory', async () => {
    const store = new FileStateStore(cookieFile, pageFile)
    const session = { token: 'FBXSID="abc"', acquiredAt: '2026-10-19T08:00:00.000Z' }

    await store.saveSession(session)

    expect(await store.loadSession()).toEqual(session)
  })

  it('overwrites the previous session', async () => {
    const store = new FileStateStore(cookieFile, pageFile)
    await store.saveSession({ token: 'FBXSID="old"', acquiredAt: '2026-10-18T08:00:00.000Z' })
    await store.saveSession({ token: 'FBXSID="new"', acquiredAt: '2026-10-19T08:00:00.000Z' })

    expect((await store.loadSession())?.token).toBe('FBXSID="new"')
  })

  it('ignores a file that is not JSON', async () => {
    const file = join(dir, 'cookie.json')
    writeFileSync(file, 'FBXSID=abc')
    expect(await new FileStateStore(file, null).loadSession()).toBeNull()
  })

  it('ignores JSON that is not a session', async () => {
    const file = join(dir, 'cookie.json')
    writeFileSync(file, JSON.stringify({ token: '', acquiredAt: 12 }))
    expect(await new FileStateStore(file, null).loadSession()).toBeNull()
  })

  it('writes the scratch page', async () => {
    const store = new FileStateStore(cookieFile, pageFile)
    await store.savePage({ url: 'http://router.test/x', body: '<p>42 dB</p>' })
    expect(readFileSync(pageFile, 'utf-8')).toBe('<p>42 dB</p>')
  })

  it('skips the scratch page when disabled', async () => {
    const store = new FileStateStore(cookieFile, null)
    await store.savePage({ url: 'http://router.test/x', body: '<p>42 dB</p>' })
    expect(existsSync(pageFile)).toBe(false)
  })
})
