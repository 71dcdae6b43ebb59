/**
 * LocalBitStorage - in-process bit array
 *
 * Bits are packed most-significant-first within each byte, the order Redis
 * uses for SETBIT/GETBIT, so toBytes() matches a GET of a remote bitmap
 * built from the same keys.
 *
 * Each operation runs its k-bit loop synchronously with no await inside:
 * on the event loop that is an exclusive section, so operations on one
 * instance are linearizable. There is no cross-process visibility.
 */

import type { HashQuad } from '../bloom/types'
import { bitIndex } from '../bloom/hashing'
import { BaseBitStorage } from './BaseBitStorage'

export class LocalBitStorage extends BaseBitStorage {
  readonly type = 'local'

  private readonly bits: Uint8Array

  constructor(m: number, k: number) {
    super(m, k)
    this.bits = new Uint8Array(Math.ceil(this.m / 8))
  }

  async setAll(h: HashQuad): Promise<void> {
    for (let i = 0; i < this.k; i++) {
      this.setBit(bitIndex(h, i, this.m))
    }
  }

  async testAll(h: HashQuad): Promise<boolean> {
    for (let i = 0; i < this.k; i++) {
      if (!this.getBit(bitIndex(h, i, this.m))) {
        return false
      }
    }
    return true
  }

  async testAddAll(h: HashQuad): Promise<boolean> {
    let present = true
    for (let i = 0; i < this.k; i++) {
      const index = bitIndex(h, i, this.m)
      if (!this.getBit(index)) {
        present = false
      }
      this.setBit(index)
    }
    return present
  }

  async clearAll(): Promise<void> {
    this.bits.fill(0)
  }

  /**
   * Copy of the bit array, ceil(m / 8) bytes
   */
  toBytes(): Uint8Array {
    return this.bits.slice()
  }

  /**
   * Number of bits currently set
   */
  popCount(): number {
    let count = 0
    for (const byte of this.bits) {
      let b = byte
      while (b) {
        b &= b - 1
        count++
      }
    }
    return count
  }

  private setBit(index: number): void {
    this.bits[Math.floor(index / 8)] |= 0x80 >> index % 8
  }

  private getBit(index: number): boolean {
    return (this.bits[Math.floor(index / 8)] & (0x80 >> index % 8)) !== 0
  }
}
