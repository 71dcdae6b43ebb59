/**
 * BaseBitStorage - Abstract base class for bit storage implementations
 *
 * Floors the filter parameters and declares the BitStorage operations.
 * Subclasses only implement the four bit operations.
 */

import type { BitStorage, HashQuad } from '../bloom/types'
import { atLeastOne } from '../bloom/estimate'

export abstract class BaseBitStorage implements BitStorage {
  /**
   * Backend type identifier ('local', 'ioredis', 'redis')
   */
  abstract readonly type: string

  readonly m: number
  readonly k: number

  /**
   * @param m - Bit-array size, floored to 1
   * @param k - Hash count, floored to 1
   */
  constructor(m: number, k: number) {
    this.m = atLeastOne(m)
    this.k = atLeastOne(k)
  }

  abstract setAll(h: HashQuad): Promise<void>
  abstract testAll(h: HashQuad): Promise<boolean>
  abstract testAddAll(h: HashQuad): Promise<boolean>
  abstract clearAll(): Promise<void>
}
