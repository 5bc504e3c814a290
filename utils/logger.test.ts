import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, resolveLogLevel } from './logger.js'

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('resolveLogLevel', () => {
    it('should read NANDFS_LOG_LEVEL case-insensitively', () => {
      expect(resolveLogLevel({ NANDFS_LOG_LEVEL: 'WARN' })).toBe('warn')
    })

    it('should fall back to debug with NANDFS_DEBUG and to info otherwise', () => {
      expect(resolveLogLevel({ NANDFS_DEBUG: '1' })).toBe('debug')
      expect(resolveLogLevel({ NANDFS_LOG_LEVEL: 'loud' })).toBe('info')
      expect(resolveLogLevel({})).toBe('info')
    })
  })

  describe('createLogger', () => {
    it('should drop messages below the threshold', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => {})
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

      const log = createLogger('[test]', 'warn')
      log.info('quiet')
      log.warn('loud', 42)

      expect(info).not.toHaveBeenCalled()
      expect(warn).toHaveBeenCalledWith('[test]', 'loud', 42)
    })

    it('should print nothing when silent', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {})
      createLogger('[test]', 'silent').error('boom')
      expect(error).not.toHaveBeenCalled()
    })

    it('should extend the prefix for child loggers', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})

      createLogger('[nandfs]', 'debug').child('engine').debug('mounted')
      createLogger('nandfs', 'debug').child('host').debug('wrote')

      expect(debug).toHaveBeenNthCalledWith(1, '[nandfs:engine]', 'mounted')
      expect(debug).toHaveBeenNthCalledWith(2, 'nandfs:host', 'wrote')
    })
  })
})
