import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { SafeConsole, log, warn, error, info, debug, group, groupEnd } from './SafeConsole.ts'

describe('SafeConsole', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    vi.spyOn(console, 'group').mockImplementation(() => {})
    vi.spyOn(console, 'groupEnd').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  describe('error (always logs)', () => {
    it('calls console.error regardless of environment', () => {
      SafeConsole.error('test error')
      expect(console.error).toHaveBeenCalledWith('test error')
    })

    it('passes multiple arguments', () => {
      SafeConsole.error('error', { data: 123 }, 'more')
      expect(console.error).toHaveBeenCalledWith('error', { data: 123 }, 'more')
    })
  })

  describe('outside development', () => {
    it('drops dev-only output', () => {
      SafeConsole.log('test')
      SafeConsole.warn('test')
      SafeConsole.info('test')
      SafeConsole.debug('test')
      SafeConsole.group('test group')
      SafeConsole.groupEnd()

      expect(console.log).not.toHaveBeenCalled()
      expect(console.warn).not.toHaveBeenCalled()
      expect(console.info).not.toHaveBeenCalled()
      expect(console.debug).not.toHaveBeenCalled()
      expect(console.group).not.toHaveBeenCalled()
      expect(console.groupEnd).not.toHaveBeenCalled()
    })
  })

  describe('in development', () => {
    beforeEach(() => {
      vi.stubEnv('VITEST', '')
      vi.stubEnv('NODE_ENV', 'development')
    })

    it('passes dev-only output through', () => {
      SafeConsole.log('a', 'b')
      SafeConsole.warn('w')
      SafeConsole.info('i')
      SafeConsole.debug('d', 1)
      SafeConsole.group('g')
      SafeConsole.groupEnd()

      expect(console.log).toHaveBeenCalledWith('a', 'b')
      expect(console.warn).toHaveBeenCalledWith('w')
      expect(console.info).toHaveBeenCalledWith('i')
      expect(console.debug).toHaveBeenCalledWith('d', 1)
      expect(console.group).toHaveBeenCalledWith('g')
      expect(console.groupEnd).toHaveBeenCalledTimes(1)
    })
  })

  describe('function references', () => {
    it('individual exports match SafeConsole methods', () => {
      expect(log).toBe(SafeConsole.log)
      expect(warn).toBe(SafeConsole.warn)
      expect(error).toBe(SafeConsole.error)
      expect(info).toBe(SafeConsole.info)
      expect(debug).toBe(SafeConsole.debug)
      expect(group).toBe(SafeConsole.group)
      expect(groupEnd).toBe(SafeConsole.groupEnd)
    })
  })
})
