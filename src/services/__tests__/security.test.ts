import { describe, it, expect } from 'vitest'
import { SecurityService } from '../security.js'

describe('SecurityService', () => {
  describe('obfuscateIp', () => {
    it('keeps the first and last IPv4 octets', () => {
      expect(SecurityService.obfuscateIp('203.0.113.7')).toBe('203.xxx.xxx.7')
    })

    it('keeps the first and last IPv6 groups', () => {
      expect(SecurityService.obfuscateIp('2001:db8::1')).toBe('2001:xxxx:xxxx:xxxx:xxxx:xxxx:xxxx:1')
    })

    it('reports a missing IP as Unknown', () => {
      expect(SecurityService.obfuscateIp(null)).toBe('Unknown')
    })

    it('masks anything else entirely', () => {
      expect(SecurityService.obfuscateIp('localhost')).toBe('xxx.xxx.xxx.xxx')
    })
  })

  describe('redactSecrets', () => {
    it('removes bot tokens from API URLs', () => {
      expect(SecurityService.redactSecrets('POST https://api.telegram.org/bot123:test-secret/sendMessage'))
        .toBe('POST https://api.telegram.org[REDACTED]/sendMessage')
    })

    it('removes bare bot tokens', () => {
      expect(SecurityService.redactSecrets('token is 123456:abcdefghijklmnopqrstuvwxyz'))
        .toBe('token is [REDACTED]')
    })

    it('removes the botToken field from serialized config', () => {
      expect(SecurityService.redactSecrets('{"botToken": "test-token","recipientChatId":1}'))
        .toBe('{[REDACTED],"recipientChatId":1}')
    })

    it('leaves IP addresses alone', () => {
      expect(SecurityService.redactSecrets('IP check successful: 203.0.113.7')).toBe('IP check successful: 203.0.113.7')
    })
  })

  describe('sanitizeErrorMessage', () => {
    it('removes IP addresses', () => {
      expect(SecurityService.sanitizeErrorMessage('connect ECONNREFUSED 10.0.0.1:443'))
        .toBe('connect ECONNREFUSED [REDACTED]:443')
    })

    it('truncates long messages', () => {
      const sanitized = SecurityService.sanitizeErrorMessage('a'.repeat(250))
      expect(sanitized).toBe('a'.repeat(197) + '...')
    })
  })
})
