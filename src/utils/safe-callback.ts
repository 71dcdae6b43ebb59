/**
 * Safe Callback Wrapper Utility
 *
 * Invokes user callbacks (cache expiry notifications) that may be sync or
 * async, logging their failures instead of letting them escape into a timer
 * callback or an unhandled rejection.
 *
 * @module utils/safe-callback
 */

import { logger, type Logger } from './logger'

// =============================================================================
// Types
// =============================================================================

export type MaybeAsyncCallback<TArgs extends unknown[] = []> = (
  ...args: TArgs
) => void | Promise<void>

export interface SafeCallbackOptions {
  /** Defaults to the global logger */
  logger?: Logger | undefined
  /** @default '[SafeCallback]' */
  logPrefix?: string | undefined
  /** Extra fields included in the warning */
  context?: Record<string, unknown> | undefined
}

/**
 * Outcome of a safeCallback invocation.
 * For async callbacks the promise never rejects.
 */
export type SafeCallbackResult =
  | { type: 'sync'; success: true }
  | { type: 'sync'; success: false; error: Error }
  | { type: 'async'; promise: Promise<void> }

// =============================================================================
// Implementation
// =============================================================================

/**
 * Invoke a callback, catching both sync throws and async rejections.
 *
 * @example
 * ```typescript
 * safeCallback(onExpire, { logPrefix: '[LocalCache]', context: { key } }, key, value)
 * ```
 */
export function safeCallback<TArgs extends unknown[]>(
  callback: MaybeAsyncCallback<TArgs>,
  options: SafeCallbackOptions = {},
  ...args: TArgs
): SafeCallbackResult {
  const log = options.logger ?? logger
  const prefix = options.logPrefix ?? '[SafeCallback]'

  const handleError = (error: unknown): Error => {
    const err = error instanceof Error ? error : new Error(String(error))
    const contextStr = options.context ? ` (context: ${formatContext(options.context)})` : ''
    log.warn(`${prefix} Callback error${contextStr}: ${err.message}`, err)
    return err
  }

  try {
    const result = callback(...args)

    if (result instanceof Promise) {
      const handled = result.then(
        () => undefined,
        (error: unknown) => {
          handleError(error)
        }
      )
      return { type: 'async', promise: handled }
    }

    return { type: 'sync', success: true }
  } catch (error) {
    return { type: 'sync', success: false, error: handleError(error) }
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

function formatContext(context: Record<string, unknown>): string {
  try {
    return JSON.stringify(context)
  } catch {
    return Object.keys(context).join(', ')
  }
}
