/**
 * Type-checked coercion of Redis script replies
 *
 * @module redis/reply
 */

import { DataTypeError } from '../errors'

const INTEGER_TEXT = /^-?\d+$/

/**
 * Strict integer reply: only a JS number holding a safe integer is accepted.
 * Both clients decode RESP integers this way.
 */
export function expectInteger(reply: unknown, operation: string): number {
  if (typeof reply === 'number' && Number.isSafeInteger(reply)) {
    return reply
  }
  throw new DataTypeError('integer reply', reply, { operation })
}

/**
 * Generic integer coercion: a safe-integer number, or a bulk string
 * (text or Buffer) of decimal digits. Booleans, bigints, nil and arrays are
 * rejected.
 */
export function toInteger(reply: unknown, operation: string): number {
  if (typeof reply === 'number') {
    return expectInteger(reply, operation)
  }
  if (typeof reply === 'string' || Buffer.isBuffer(reply)) {
    const text = reply.toString()
    const value = Number(text)
    if (INTEGER_TEXT.test(text) && Number.isSafeInteger(value)) {
      return value
    }
  }
  throw new DataTypeError('integer reply', reply, { operation })
}

/**
 * Bulk string reply of a cache read: nil is a miss, text stays text, a
 * Buffer becomes bytes
 */
export function toCacheReply(reply: unknown, operation: string): string | Uint8Array | undefined {
  if (reply === null || reply === undefined) return undefined
  if (typeof reply === 'string') return reply
  if (Buffer.isBuffer(reply)) return new Uint8Array(reply)
  throw new DataTypeError('bulk string reply', reply, { operation })
}
