/**
 * Hash derivation and the enhanced double-hashing location scheme
 *
 * @module bloom/hashing
 */

import { murmur3x64_128 } from '../hash/murmur3'
import type { BloomKey, HashQuad } from './types'

const encoder = new TextEncoder()

export function keyToBytes(key: BloomKey): Uint8Array {
  return typeof key === 'string' ? encoder.encode(key) : key
}

/**
 * The four base hashes of a key: MurmurHash3 x64/128 with seed 0 gives
 * h[0], h[1]; seed 1 gives h[2], h[3].
 */
export function baseHashes(data: Uint8Array): HashQuad {
  const [h1, h2] = murmur3x64_128(data, 0)
  const [h3, h4] = murmur3x64_128(data, 1)
  return [h1, h2, h3, h4]
}

/**
 * The i-th 64-bit virtual location:
 * `h[i mod 2] + i * h[2 + ((i + (i mod 2)) mod 4) / 2]`, wrapped to 64 bits.
 */
export function location(h: HashQuad, i: number): bigint {
  const a = h[i % 2]
  const b = h[2 + ((i + (i % 2)) % 4) / 2]
  return BigInt.asUintN(64, a + BigInt(i) * b)
}

/**
 * Bit index of the i-th location in an m-bit array.
 * The Lua scripts in storage/scripts compute the same value.
 */
export function bitIndex(h: HashQuad, i: number, m: number): number {
  return Number(location(h, i) % BigInt(m))
}

/**
 * All k bit indexes of `h` in an m-bit array, in location order
 */
export function bitIndexes(h: HashQuad, k: number, m: number): number[] {
  const indexes: number[] = []
  for (let i = 0; i < k; i++) {
    indexes.push(bitIndex(h, i, m))
  }
  return indexes
}
