import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { Logger, LogLevel } from '../logger.js'

describe('Logger', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ipwatch-logs-'))
    Logger.init({ logDir: dir, console: false })
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  const read = (name: string) => fs.readFileSync(path.join(dir, name), 'utf8')

  it('formats a line with timestamp, level and context', () => {
    const line = Logger.formatMessage(LogLevel.INFO, 'hello', undefined, { a: 1 })
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO: hello \| Context: \{"a":1\}\n$/)
  })

  it('writes info to app.log only', () => {
    Logger.info('IP check successful: 203.0.113.7')

    expect(read('app.log')).toMatch(/INFO: IP check successful: 203\.0\.113\.7\n$/)
    expect(fs.existsSync(path.join(dir, 'error.log'))).toBe(false)
  })

  it('writes errors to both files', () => {
    Logger.error('send failed', new Error('boom'))

    expect(read('error.log')).toContain('ERROR: send failed | Error: boom | Stack: Error: boom')
    expect(read('app.log')).toBe(read('error.log'))
  })

  it('redacts bot tokens before writing', () => {
    Logger.warn('token is 123456:abcdefghijklmnopqrstuvwxyz')

    expect(read('app.log')).toMatch(/WARN: token is \[REDACTED\]\n$/)
  })

  it('rotates app.log once it would exceed maxBytes', () => {
    Logger.init({ logDir: dir, console: false, maxBytes: 200, backupCount: 2 })

    for (let i = 0; i < 10; i++) {
      Logger.info(`message ${i} ${'x'.repeat(50)}`)
    }

    expect(fs.statSync(path.join(dir, 'app.log')).size).toBeLessThanOrEqual(200)
    expect(fs.existsSync(path.join(dir, 'app.log.1'))).toBe(true)
    expect(fs.existsSync(path.join(dir, 'app.log.2'))).toBe(true)
    expect(fs.existsSync(path.join(dir, 'app.log.3'))).toBe(false)
    expect(read('app.log')).toContain('message 9')
  })
})
