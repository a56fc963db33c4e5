import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import http from 'http'
import type { Server } from 'http'
import { createApp, startStatusServer } from '../app.js'
import { IpMonitor } from '../services/ipMonitor.js'
import { StorageService } from '../services/storage.js'
import type { Config } from '../types/index.js'

const config: Config = {
  botToken: 'test-token',
  recipientChatId: 12345,
  checkIntervalMinutes: 5,
  statusPort: 0,
}

describe('status endpoints', () => {
  let dir: string
  let storage: StorageService
  let monitor: IpMonitor
  let server: Server
  let baseUrl: string

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ipwatch-app-'))
    storage = new StorageService(dir)
    storage.initialize()

    monitor = new IpMonitor({
      config,
      storage,
      detector: { getCurrentIp: vi.fn(async () => '203.0.113.7') },
      notifier: { sendMessage: vi.fn(async () => {}) },
    })

    server = createApp({ config, monitor, storage }).listen(0, '127.0.0.1')
    await new Promise<void>(resolve => server.once('listening', () => resolve()))
    const address = server.address()
    if (!address || typeof address === 'string') throw new Error('server has no port')
    baseUrl = `http://127.0.0.1:${address.port}`
  })

  afterEach(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()))
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('GET /api/health reports healthy', async () => {
    const res = await fetch(`${baseUrl}/api/health`)

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'healthy', uptime: expect.any(Number) })
  })

  it('GET /api/status obfuscates the current IP', async () => {
    storage.updateLastKnownIp('203.0.113.7', '2026-01-01T00:00:00.000Z')

    const res = await fetch(`${baseUrl}/api/status`)

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      currentIp: '203.xxx.xxx.7',
      lastCheckAt: '2026-01-01T00:00:00.000Z',
      status: 'active',
      nextCheck: null,
      checkIntervalMinutes: 5,
      lastResult: null,
    })
  })

  it('GET /api/status includes the outcome of the latest check', async () => {
    await monitor.performIpCheck()

    const res = await fetch(`${baseUrl}/api/status`)

    expect(await res.json()).toMatchObject({
      currentIp: '203.xxx.xxx.7',
      status: 'active',
      lastResult: {
        success: true,
        ipChanged: true,
        notified: true,
        currentIp: '203.xxx.xxx.7',
        message: 'IP address change notified',
      },
    })
  })

  it('GET /api/status reports Unknown before the first check', async () => {
    const res = await fetch(`${baseUrl}/api/status`)

    expect(await res.json()).toMatchObject({ currentIp: 'Unknown', lastCheckAt: null })
  })

  it('GET /api/history obfuscates both addresses', async () => {
    storage.addChangeEntry({
      id: 'entry-1',
      timestamp: '2026-01-01T00:00:00.000Z',
      oldIp: null,
      newIp: '198.51.100.2',
      notified: true,
    })

    const res = await fetch(`${baseUrl}/api/history`)

    expect(await res.json()).toEqual({
      updates: [{
        id: 'entry-1',
        timestamp: '2026-01-01T00:00:00.000Z',
        oldIp: 'Unknown',
        newIp: '198.xxx.xxx.2',
        notified: true,
      }],
    })
  })

  it('GET /api/status answers 500 when the state file is corrupt', async () => {
    fs.writeFileSync(storage.statePath, 'not json')

    const res = await fetch(`${baseUrl}/api/status`)

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({
      success: false,
      error: 'Failed to get status',
      details: expect.stringMatching(/^Failed to read state\.json/),
    })
  })

  it('offers no write endpoints', async () => {
    const res = await fetch(`${baseUrl}/api/status`, { method: 'POST' })
    expect(res.status).toBe(404)
  })

  it('startStatusServer survives a port that is already taken', async () => {
    const blocker = http.createServer()
    await new Promise<void>(resolve => blocker.listen(0, resolve))
    const address = blocker.address()
    if (!address || typeof address === 'string') throw new Error('server has no port')

    try {
      const status = startStatusServer(createApp({ config, monitor, storage }), address.port)
      const error = await new Promise<Error>(resolve => {
        status.prependOnceListener('error', resolve)
      })

      expect(error.message).toMatch(/EADDRINUSE/)
      expect(status.listenerCount('error')).toBe(1)
      expect(status.listening).toBe(false)
    } finally {
      await new Promise<void>(resolve => blocker.close(() => resolve()))
    }
  })
})
