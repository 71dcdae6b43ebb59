/**
 * safeCallback and logger tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { safeCallback } from '../../src/utils/safe-callback'
import { createConsoleLogger, logger, noopLogger, setLogger, type Logger } from '../../src/utils/logger'

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = []
  return {
    warnings,
    debug: () => {},
    info: () => {},
    warn: (message: string) => {
      warnings.push(message)
    },
    error: () => {},
  }
}

describe('safeCallback', () => {
  it('reports success of a sync callback', () => {
    const callback = vi.fn()
    const result = safeCallback(callback, {}, 'a', 1)
    expect(result).toEqual({ type: 'sync', success: true })
    expect(callback).toHaveBeenCalledWith('a', 1)
  })

  it('catches and logs a sync throw', () => {
    const log = recordingLogger()
    const result = safeCallback(
      () => {
        throw new Error('sync failure')
      },
      { logger: log, logPrefix: '[LocalCache]', context: { key: 'k1' } }
    )
    expect(result.type).toBe('sync')
    if (result.type === 'sync' && !result.success) {
      expect(result.error.message).toBe('sync failure')
    }
    expect(log.warnings).toEqual(['[LocalCache] Callback error (context: {"key":"k1"}): sync failure'])
  })

  it('turns an async rejection into a logged warning', async () => {
    const log = recordingLogger()
    const result = safeCallback(
      async () => {
        throw new Error('async failure')
      },
      { logger: log }
    )
    expect(result.type).toBe('async')
    if (result.type === 'async') {
      await expect(result.promise).resolves.toBeUndefined()
    }
    expect(log.warnings).toEqual(['[SafeCallback] Callback error: async failure'])
  })

  it('wraps non-Error throws', () => {
    const log = recordingLogger()
    safeCallback(
      () => {
        throw 'plain string'
      },
      { logger: log }
    )
    expect(log.warnings).toEqual(['[SafeCallback] Callback error: plain string'])
  })
})

describe('logger', () => {
  afterEach(() => {
    setLogger(noopLogger)
    vi.restoreAllMocks()
  })

  it('is a noop until replaced', () => {
    expect(logger).toBe(noopLogger)
  })

  it('swaps the global logger', () => {
    const log = recordingLogger()
    setLogger(log)
    expect(logger).toBe(log)
  })

  it('filters console output below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const log = createConsoleLogger('warn')
    log.debug('hidden')
    log.warn('shown', 42)
    expect(debug).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledWith('[WARN] shown', 42)
  })
})
