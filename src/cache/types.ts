/**
 * Cache store types
 *
 * @module cache/types
 */

import type { RandomSource } from '../utils/random'

/**
 * Values a cache accepts. Remote stores keep everything as text (booleans
 * as '1'/'0'); the typed getters on Cache convert back.
 */
export type CacheValue = string | number | boolean | Uint8Array

/**
 * Key/value store with optional, jittered time-to-live.
 *
 * A TTL of 0 means no expiry. A positive TTL `t` is applied as
 * `t + rnd(floor(t / 10) + 1)` seconds.
 */
export interface CacheStore {
  /** Backend identifier ('local', 'ioredis', 'redis') */
  readonly type: string

  /** Store with the store's default TTL (jittered) */
  set(key: string, value: CacheValue): Promise<void>

  /** Store with an explicit TTL in seconds */
  setWithExpire(key: string, value: CacheValue, ttlSeconds: number): Promise<void>

  /**
   * Read a value and restart its TTL.
   * A missing or expired key is `undefined`, not an error.
   */
  get(key: string): Promise<CacheValue | undefined>

  /** Remove a key; removing a missing key is not an error */
  del(key: string): Promise<void>
}

export interface CacheStoreOptions {
  /** TTL in seconds applied by set() (default: 0, no expiry) */
  defaultTtlSeconds?: number | undefined
  /** Source of TTL jitter (default: CSPRNG) */
  random?: RandomSource | undefined
}
