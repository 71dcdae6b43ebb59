/**
 * MurmurHash3 x64/128 Tests
 */

import { describe, it, expect } from 'vitest'
import { murmur3x64_128 } from '../../src/hash/murmur3'

const encode = (text: string): Uint8Array => new TextEncoder().encode(text)

describe('murmur3x64_128', () => {
  it('hashes empty input with seed 0 to zero', () => {
    expect(murmur3x64_128(new Uint8Array(0))).toEqual([0n, 0n])
  })

  it('hashes empty input with seed 1', () => {
    expect(murmur3x64_128(new Uint8Array(0), 1)).toEqual([0x4610abe56eff5cb5n, 0x51622daa78f83583n])
  })

  it('matches the reference digest of the pangram', () => {
    const [h1, h2] = murmur3x64_128(encode('The quick brown fox jumps over the lazy dog'))
    expect(h1).toBe(0xe34bbc7bbc071b6cn)
    expect(h2).toBe(0x7a433ca9c49a9347n)
  })

  it('hashes a short tail-only input', () => {
    expect(murmur3x64_128(encode('hello'))).toEqual([0xcbd8a7b341bd9b02n, 0x5b1e906a48ae1d19n])
  })

  it('keeps both halves within 64 bits', () => {
    for (let length = 0; length < 40; length++) {
      const data = new Uint8Array(length).fill(0xff)
      for (const half of murmur3x64_128(data, 0xffffffff)) {
        expect(half >= 0n && half < 1n << 64n).toBe(true)
      }
    }
  })

  it('depends on the seed', () => {
    const data = encode('Bess')
    expect(murmur3x64_128(data, 0)).not.toEqual(murmur3x64_128(data, 1))
  })
})
