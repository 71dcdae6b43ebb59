/**
 * TTL validation shared by the cache stores
 */

import { ValidationError } from '../errors'

export function validateTtl(ttlSeconds: number, field = 'ttlSeconds'): number {
  if (!Number.isInteger(ttlSeconds) || ttlSeconds < 0) {
    throw new ValidationError(`${field} must be a non-negative integer, got ${ttlSeconds}`, field, ttlSeconds)
  }
  return ttlSeconds
}
