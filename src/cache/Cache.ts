/**
 * Cache - typed facade over a CacheStore
 *
 * @example
 * ```typescript
 * const cache = new Cache(new LocalCache({ defaultTtlSeconds: 60 }))
 * await cache.set('hits', 3)
 * await cache.getInt('hits') // 3
 * await cache.getInt('missing') // undefined
 * ```
 */

import { coerceBool, coerceBytes, coerceFloat, coerceInt, coerceString } from './coerce'
import type { CacheStore, CacheValue } from './types'

export class Cache {
  constructor(readonly store: CacheStore) {}

  async set(key: string, value: CacheValue): Promise<void> {
    await this.store.set(key, value)
  }

  async setWithExpire(key: string, value: CacheValue, ttlSeconds: number): Promise<void> {
    await this.store.setWithExpire(key, value, ttlSeconds)
  }

  async get(key: string): Promise<CacheValue | undefined> {
    return this.store.get(key)
  }

  async getInt(key: string): Promise<number | undefined> {
    return this.read(key, coerceInt)
  }

  async getFloat(key: string): Promise<number | undefined> {
    return this.read(key, coerceFloat)
  }

  async getString(key: string): Promise<string | undefined> {
    return this.read(key, coerceString)
  }

  async getBytes(key: string): Promise<Uint8Array | undefined> {
    return this.read(key, coerceBytes)
  }

  async getBool(key: string): Promise<boolean | undefined> {
    return this.read(key, coerceBool)
  }

  async del(key: string): Promise<void> {
    await this.store.del(key)
  }

  private async read<T>(key: string, coerce: (value: CacheValue, key: string) => T): Promise<T | undefined> {
    const value = await this.store.get(key)
    return value === undefined ? undefined : coerce(value, key)
  }
}
