/**
 * Backend assembly from a SharedBloomConfig
 *
 * createClients() opens the Redis connection the configured backend needs
 * (none for 'local'); createBloomFilter() and createCache() then build the
 * filter and cache on top of those clients.
 *
 * @module factory
 */

import { Redis } from 'ioredis'
import { createClient } from 'redis'
import { BloomFilter, newIoRedisWithEstimates, newLocalWithEstimates, newNodeRedisWithEstimates } from './bloom/BloomFilter'
import { Cache } from './cache/Cache'
import { IoRedisCache } from './cache/IoRedisCache'
import { LocalCache, type CacheExpireCallback } from './cache/LocalCache'
import { NodeRedisCache } from './cache/NodeRedisCache'
import type { SharedBloomConfig } from './config'
import { ConfigurationError } from './errors'
import type { IoRedisClient, NodeRedisClient, NodeRedisEvalOptions } from './redis/clients'
import { consoleLogger, logger, setLogger } from './utils/logger'
import type { RandomSource } from './utils/random'

// =============================================================================
// Types
// =============================================================================

export interface SharedBloomClients {
  ioredis?: IoRedisClient | undefined
  redis?: NodeRedisClient | undefined
  /** Close every connection opened by createClients */
  close(): Promise<void>
}

export interface CreateCacheOptions {
  random?: RandomSource | undefined
  /** Local backend only */
  onExpire?: CacheExpireCallback | undefined
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Switch the global logger to the console when `config.debug` is set
 */
export function configureLogging(config: Pick<SharedBloomConfig, 'debug'>): void {
  if (config.debug) {
    setLogger(consoleLogger)
  }
}

/**
 * Connect the client the configured backend uses
 */
export async function createClients(config: SharedBloomConfig): Promise<SharedBloomClients> {
  configureLogging(config)

  if (config.backend === 'local') {
    return { close: async () => {} }
  }

  const url = config.redisUrl
  if (url === undefined) {
    throw new ConfigurationError(`REDIS_URL is required for the ${config.backend} backend`, 'REDIS_URL')
  }

  if (config.backend === 'ioredis') {
    const client = new Redis(url, { lazyConnect: true })
    client.on('error', (error: Error) => logger.error('[ioredis] connection error', error))
    try {
      await client.connect()
    } catch (error) {
      // Stop the background reconnect loop before surfacing the failure
      client.disconnect()
      throw error
    }
    logger.info('[ioredis] connected')
    return {
      ioredis: client,
      close: async () => {
        await client.quit()
      },
    }
  }

  // No reconnect strategy: an unreachable server rejects connect() instead of retrying forever
  const client = createClient({ url, socket: { reconnectStrategy: false } })
  client.on('error', (error: Error) => logger.error('[redis] connection error', error))
  try {
    await client.connect()
  } catch (error) {
    if (client.isOpen) {
      await client.disconnect()
    }
    throw error
  }
  logger.info('[redis] connected')
  // EVAL/EVALSHA go through sendCommand, whose arguments may be Buffers
  const evalCommand = (command: 'EVAL' | 'EVALSHA', script: string, options: NodeRedisEvalOptions) =>
    client.sendCommand<unknown>([command, script, String(options.keys.length), ...options.keys, ...options.arguments])

  return {
    redis: {
      evalSha: (sha1, options) => evalCommand('EVALSHA', sha1, options),
      eval: (script, options) => evalCommand('EVAL', script, options),
      del: (keys) => client.del(keys),
    },
    close: async () => {
      await client.quit()
    },
  }
}

/**
 * Filter sized for `config.capacity` keys at `config.falsePositiveRate`.
 * Remote filters share the bitmap at `config.filterKey`.
 */
export function createBloomFilter(config: SharedBloomConfig, clients?: SharedBloomClients): BloomFilter {
  const { capacity, falsePositiveRate, filterKey } = config
  switch (config.backend) {
    case 'local':
      return newLocalWithEstimates(capacity, falsePositiveRate)
    case 'ioredis':
      return newIoRedisWithEstimates(capacity, falsePositiveRate, filterKey, clients?.ioredis)
    case 'redis':
      return newNodeRedisWithEstimates(capacity, falsePositiveRate, filterKey, () => clients?.redis)
  }
}

export function createCache(
  config: SharedBloomConfig,
  clients?: SharedBloomClients,
  options: CreateCacheOptions = {}
): Cache {
  const storeOptions = { defaultTtlSeconds: config.cacheTtlSeconds, random: options.random }
  switch (config.backend) {
    case 'local':
      return new Cache(new LocalCache({ ...storeOptions, onExpire: options.onExpire }))
    case 'ioredis':
      return new Cache(new IoRedisCache(clients?.ioredis, storeOptions))
    case 'redis':
      return new Cache(new NodeRedisCache(() => clients?.redis, storeOptions))
  }
}
