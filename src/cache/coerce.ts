/**
 * Typed reads of cached values
 *
 * Each coercion takes a defined CacheValue and either converts it or throws
 * DataTypeError. Text is parsed strictly: surrounding whitespace or
 * trailing garbage is a type error, not a partial parse.
 *
 * @module cache/coerce
 */

import { DataTypeError } from '../errors'
import type { CacheValue } from './types'

const INTEGER_TEXT = /^[+-]?\d+$/
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

const TRUE_TEXT = new Set(['1', 't', 'T', 'TRUE', 'true', 'True'])
const FALSE_TEXT = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False'])

const decoder = new TextDecoder('utf-8', { fatal: true })
const encoder = new TextEncoder()

function asText(value: CacheValue): string | undefined {
  if (typeof value === 'string') return value
  if (value instanceof Uint8Array) {
    try {
      return decoder.decode(value)
    } catch {
      return undefined
    }
  }
  return undefined
}

export function coerceInt(value: CacheValue, key: string): number {
  if (typeof value === 'number') {
    if (Number.isSafeInteger(value)) return value
    throw new DataTypeError('integer', value, { key })
  }
  const text = asText(value)
  if (text !== undefined && INTEGER_TEXT.test(text)) {
    const parsed = Number(text)
    if (Number.isSafeInteger(parsed)) return parsed
  }
  throw new DataTypeError('integer', value, { key })
}

export function coerceFloat(value: CacheValue, key: string): number {
  if (typeof value === 'number') return value
  const text = asText(value)
  if (text !== undefined && FLOAT_TEXT.test(text)) {
    return Number(text)
  }
  throw new DataTypeError('float', value, { key })
}

export function coerceString(value: CacheValue, key: string): string {
  const text = asText(value)
  if (text === undefined) {
    throw new DataTypeError('string', value, { key })
  }
  return text
}

export function coerceBytes(value: CacheValue, key: string): Uint8Array {
  if (value instanceof Uint8Array) return value
  if (typeof value === 'string') return encoder.encode(value)
  throw new DataTypeError('bytes', value, { key })
}

export function coerceBool(value: CacheValue, key: string): boolean {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value === 1
  const text = asText(value)
  if (text !== undefined) {
    if (TRUE_TEXT.has(text)) return true
    if (FALSE_TEXT.has(text)) return false
  }
  throw new DataTypeError('boolean', value, { key })
}
