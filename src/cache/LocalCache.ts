/**
 * LocalCache - in-process CacheStore backed by a Map
 *
 * Expired entries are never returned. They are removed either when read or
 * by a periodic sweep (every ttl/2 seconds, or every 60 seconds without a
 * default TTL); each removal is reported once through `onExpire`. Reading
 * an entry with a TTL restarts it with fresh jitter.
 *
 * The sweep timer is unref'd; call close() to stop it.
 */

import { logger } from '../utils/logger'
import { defaultRandomSource, jitterTtl, type RandomSource } from '../utils/random'
import { safeCallback, type MaybeAsyncCallback } from '../utils/safe-callback'
import { validateTtl } from './ttl'
import type { CacheStore, CacheStoreOptions, CacheValue } from './types'

/** Sweep period without a default TTL */
export const DEFAULT_SWEEP_SECONDS = 60

export type CacheExpireCallback = MaybeAsyncCallback<[key: string, value: CacheValue]>

export interface LocalCacheOptions extends CacheStoreOptions {
  /** Called for every entry removed because it expired */
  onExpire?: CacheExpireCallback | undefined
  /** Override the sweep period in seconds */
  sweepIntervalSeconds?: number | undefined
}

interface LocalEntry {
  value: CacheValue
  /** Configured TTL, 0 = never expires */
  ttlSeconds: number
  /** Epoch ms, 0 = never expires */
  expiresAt: number
}

export class LocalCache implements CacheStore {
  readonly type = 'local'

  private readonly entries = new Map<string, LocalEntry>()
  private readonly defaultTtlSeconds: number
  private readonly random: RandomSource
  private readonly onExpire: CacheExpireCallback | undefined
  private sweepTimer: ReturnType<typeof setInterval> | null

  constructor(options: LocalCacheOptions = {}) {
    this.defaultTtlSeconds = validateTtl(options.defaultTtlSeconds ?? 0, 'defaultTtlSeconds')
    this.random = options.random ?? defaultRandomSource
    this.onExpire = options.onExpire

    const sweepSeconds =
      options.sweepIntervalSeconds ??
      (this.defaultTtlSeconds > 0 ? Math.max(1, Math.floor(this.defaultTtlSeconds / 2)) : DEFAULT_SWEEP_SECONDS)
    this.sweepTimer = setInterval(() => this.purgeExpired(), sweepSeconds * 1000)
    this.sweepTimer.unref()
  }

  async set(key: string, value: CacheValue): Promise<void> {
    this.store(key, value, this.defaultTtlSeconds)
  }

  async setWithExpire(key: string, value: CacheValue, ttlSeconds: number): Promise<void> {
    this.store(key, value, validateTtl(ttlSeconds))
  }

  async get(key: string): Promise<CacheValue | undefined> {
    const entry = this.entries.get(key)
    if (!entry) return undefined

    const now = Date.now()
    if (isExpired(entry, now)) {
      this.expire(key, entry)
      return undefined
    }

    if (entry.ttlSeconds > 0) {
      entry.expiresAt = this.expiryFrom(now, entry.ttlSeconds)
    }
    return entry.value
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key)
  }

  /**
   * Remove every expired entry now
   * @returns number of entries removed
   */
  purgeExpired(): number {
    const now = Date.now()
    const expired: Array<[string, LocalEntry]> = []
    for (const [key, entry] of this.entries) {
      if (isExpired(entry, now)) {
        expired.push([key, entry])
      }
    }
    for (const [key, entry] of expired) {
      this.expire(key, entry)
    }
    if (expired.length > 0) {
      logger.debug(`[LocalCache] purged ${expired.length} expired entries`)
    }
    return expired.length
  }

  /**
   * Entries held, including expired ones not yet purged
   */
  get size(): number {
    return this.entries.size
  }

  /**
   * Stop the sweep timer. The cache stays usable; expired entries are then
   * only removed when read.
   */
  close(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
  }

  private store(key: string, value: CacheValue, ttlSeconds: number): void {
    this.entries.set(key, {
      value,
      ttlSeconds,
      expiresAt: ttlSeconds > 0 ? this.expiryFrom(Date.now(), ttlSeconds) : 0,
    })
  }

  private expiryFrom(now: number, ttlSeconds: number): number {
    return now + jitterTtl(ttlSeconds, this.random) * 1000
  }

  private expire(key: string, entry: LocalEntry): void {
    this.entries.delete(key)
    if (this.onExpire) {
      safeCallback(this.onExpire, { logPrefix: '[LocalCache]', context: { key } }, key, entry.value)
    }
  }
}

function isExpired(entry: LocalEntry, now: number): boolean {
  return entry.expiresAt > 0 && now >= entry.expiresAt
}
