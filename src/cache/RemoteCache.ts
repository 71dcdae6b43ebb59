/**
 * RemoteCache - CacheStore on Redis hashes written and read by Lua scripts
 *
 * Subclasses supply the client transport. Values are sent as text (numbers
 * in decimal, booleans as '1'/'0') or raw bytes; reads return text, or
 * bytes when the client replies with a Buffer.
 */

import type { RedisArg } from '../redis/clients'
import { toCacheReply } from '../redis/reply'
import type { ScriptExecutor } from '../redis/script'
import { defaultRandomSource, jitterTtl, type RandomSource } from '../utils/random'
import { GET_CACHE_SCRIPT, SET_CACHE_SCRIPT } from './scripts'
import { validateTtl } from './ttl'
import type { CacheStore, CacheStoreOptions, CacheValue } from './types'

export abstract class RemoteCache implements CacheStore {
  abstract readonly type: string

  protected readonly defaultTtlSeconds: number
  protected readonly random: RandomSource

  constructor(options: CacheStoreOptions = {}) {
    this.defaultTtlSeconds = validateTtl(options.defaultTtlSeconds ?? 0, 'defaultTtlSeconds')
    this.random = options.random ?? defaultRandomSource
  }

  /**
   * Transport for one call; throws NoBackendError when no client is set
   */
  protected abstract executor(operation: string): ScriptExecutor

  protected abstract deleteKey(key: string, operation: string): Promise<void>

  async set(key: string, value: CacheValue): Promise<void> {
    const executor = this.executor('set')
    const ttl = jitterTtl(this.defaultTtlSeconds, this.random)
    await SET_CACHE_SCRIPT.run(executor, [key], [toRedisArg(value), String(ttl)])
  }

  async setWithExpire(key: string, value: CacheValue, ttlSeconds: number): Promise<void> {
    const executor = this.executor('setWithExpire')
    await SET_CACHE_SCRIPT.run(executor, [key], [toRedisArg(value), String(validateTtl(ttlSeconds))])
  }

  async get(key: string): Promise<CacheValue | undefined> {
    const executor = this.executor('get')
    const reply = await GET_CACHE_SCRIPT.run(executor, [key], [])
    return toCacheReply(reply, 'get')
  }

  async del(key: string): Promise<void> {
    await this.deleteKey(key, 'del')
  }
}

export function toRedisArg(value: CacheValue): RedisArg {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  if (typeof value === 'boolean') return value ? '1' : '0'
  return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
}
