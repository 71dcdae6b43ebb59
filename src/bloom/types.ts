/**
 * Core types shared by the membership engine and the bit storages
 *
 * @module bloom/types
 */

/**
 * Four unsigned 64-bit base hashes of a key. Any of the k bit locations is
 * derived from these without re-hashing.
 */
export type HashQuad = readonly [bigint, bigint, bigint, bigint]

/**
 * Bit-array size and hash count of a filter
 */
export interface FilterParameters {
  /** Number of bits (>= 1) */
  readonly m: number
  /** Number of bit locations per key (>= 1) */
  readonly k: number
}

/**
 * Bloom filter key: raw bytes, or text encoded as UTF-8 without normalization
 */
export type BloomKey = Uint8Array | string

/**
 * Bit storage backing a BloomFilter.
 *
 * Every operation touches the k bits at `location(h, i) mod m`, i in [0, k),
 * and applies them all or none.
 */
export interface BitStorage extends FilterParameters {
  /** Backend identifier ('local', 'ioredis', 'redis') */
  readonly type: string

  /** Set the k bits of `h` */
  setAll(h: HashQuad): Promise<void>

  /** True iff all k bits of `h` are set. Never mutates. */
  testAll(h: HashQuad): Promise<boolean>

  /**
   * Set the k bits of `h` and report whether all of them were already set,
   * with no other mutation of the same array in between.
   */
  testAddAll(h: HashQuad): Promise<boolean>

  /** Reset every bit to zero */
  clearAll(): Promise<void>
}
