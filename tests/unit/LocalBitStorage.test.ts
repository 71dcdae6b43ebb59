/**
 * LocalBitStorage Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { LocalBitStorage } from '../../src/storage/LocalBitStorage'
import { baseHashes, keyToBytes } from '../../src/bloom/hashing'

const bess = baseHashes(keyToBytes('Bess'))

describe('LocalBitStorage', () => {
  let storage: LocalBitStorage

  beforeEach(() => {
    storage = new LocalBitStorage(1000, 7)
  })

  it('has type "local"', () => {
    expect(storage.type).toBe('local')
  })

  it('allocates ceil(m / 8) bytes', () => {
    expect(storage.toBytes()).toHaveLength(125)
    expect(new LocalBitStorage(9, 1).toBytes()).toHaveLength(2)
  })

  it('floors m and k to 1', () => {
    const tiny = new LocalBitStorage(0, 0)
    expect(tiny.m).toBe(1)
    expect(tiny.k).toBe(1)
    expect(tiny.toBytes()).toHaveLength(1)
  })

  it('sets the k bits most-significant-first', async () => {
    // Bess lands on 315, 988, 169, 631, 947, 312, 109
    await storage.setAll(bess)
    const bytes = storage.toBytes()
    expect(bytes[39]).toBe(0x90) // bits 312 and 315
    expect(bytes[123]).toBe(0x08) // bit 988
    expect(bytes[21]).toBe(0x40) // bit 169
    expect(storage.popCount()).toBe(7)
  })

  it('tests without mutating', async () => {
    expect(await storage.testAll(bess)).toBe(false)
    expect(storage.popCount()).toBe(0)
    await storage.setAll(bess)
    expect(await storage.testAll(bess)).toBe(true)
  })

  it('reports prior membership from testAddAll', async () => {
    expect(await storage.testAddAll(bess)).toBe(false)
    expect(await storage.testAddAll(bess)).toBe(true)
    expect(storage.popCount()).toBe(7)
  })

  it('clears every bit', async () => {
    await storage.setAll(bess)
    await storage.clearAll()
    expect(storage.popCount()).toBe(0)
    expect(await storage.testAll(bess)).toBe(false)
  })

  it('returns a copy from toBytes', async () => {
    const bytes = storage.toBytes()
    bytes[0] = 0xff
    expect(storage.popCount()).toBe(0)
  })
})
