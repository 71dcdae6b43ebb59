/**
 * Random utilities for TTL jitter
 *
 * Jitter is drawn from an injected RandomSource so tests (and callers that
 * need reproducible expiry) can pass a deterministic one. The default source
 * reads from the platform CSPRNG.
 *
 * @module utils/random
 */

import { webcrypto } from 'node:crypto'

/**
 * Returns an integer in [0, maxExclusive)
 */
export type RandomSource = (maxExclusive: number) => number

/**
 * Generate random bytes
 *
 * @param length - Number of random bytes to generate
 */
export function getRandomBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length)
  webcrypto.getRandomValues(bytes)
  return bytes
}

/**
 * Random integer in range [0, max)
 *
 * @param max - Exclusive upper bound (must be <= 2^32)
 */
export function getRandomInt(max: number): number {
  if (max <= 0 || max > 0x100000000) {
    throw new RangeError('max must be in range (0, 2^32]')
  }

  const bytes = getRandomBytes(4)
  const value = new DataView(bytes.buffer).getUint32(0)

  // Modulo bias is irrelevant for expiry jitter
  return value % max
}

export const defaultRandomSource: RandomSource = getRandomInt

/**
 * Jittered TTL: `ttl + rnd(floor(ttl / 10) + 1)` seconds.
 * A TTL of 0 (no expiry) is returned unchanged.
 */
export function jitterTtl(ttlSeconds: number, random: RandomSource = defaultRandomSource): number {
  if (ttlSeconds <= 0) return ttlSeconds
  return ttlSeconds + random(Math.floor(ttlSeconds / 10) + 1)
}
