/**
 * Bloom Filter membership engine
 *
 * A BloomFilter hashes each key once into four 64-bit base hashes and hands
 * them to its BitStorage, which derives the k bit locations and applies the
 * operation atomically. The engine never depends on which storage it has:
 *
 * - LocalBitStorage: in-process bit array
 * - IoRedisBitStorage: Redis bitmap over an ioredis client
 * - NodeRedisBitStorage: Redis bitmap over a node-redis client getter
 *
 * Storage errors propagate unchanged.
 *
 * @example
 * ```typescript
 * const filter = newLocalWithEstimates(1000, 0.01)
 * await filter.addString('Bess')
 * await filter.testString('Bess') // true
 * await filter.testString('Emma') // false (or, rarely, a false positive)
 * ```
 */

import { logger } from '../utils/logger'
import { runBounded } from '../utils/semaphore'
import type { IoRedisClient, NodeRedisClientGetter } from '../redis/clients'
import { LocalBitStorage } from '../storage/LocalBitStorage'
import { IoRedisBitStorage } from '../storage/IoRedisBitStorage'
import { NodeRedisBitStorage } from '../storage/NodeRedisBitStorage'
import { estimateParameters } from './estimate'
import { baseHashes, keyToBytes } from './hashing'
import type { BitStorage } from './types'

// =============================================================================
// Constants
// =============================================================================

/** Keys tested by estimateFalsePositiveRate */
export const FALSE_POSITIVE_ROUNDS = 100_000

/** In-flight operations allowed during estimateFalsePositiveRate */
export const ESTIMATE_CONCURRENCY = 1000

// =============================================================================
// BloomFilter Class
// =============================================================================

export class BloomFilter {
  constructor(readonly storage: BitStorage) {}

  /**
   * Number of bits, m
   */
  cap(): number {
    return this.storage.m
  }

  /**
   * Number of bit locations per key, k
   */
  k(): number {
    return this.storage.k
  }

  async add(data: Uint8Array): Promise<void> {
    await this.storage.setAll(baseHashes(data))
  }

  async addString(data: string): Promise<void> {
    await this.add(keyToBytes(data))
  }

  /**
   * @returns false if the data was definitely never added; true if it
   * probably was
   */
  async test(data: Uint8Array): Promise<boolean> {
    return this.storage.testAll(baseHashes(data))
  }

  async testString(data: string): Promise<boolean> {
    return this.test(keyToBytes(data))
  }

  /**
   * Test then add, as one atomic step.
   * @returns the membership result from before the add
   */
  async testAndAdd(data: Uint8Array): Promise<boolean> {
    return this.storage.testAddAll(baseHashes(data))
  }

  async testAndAddString(data: string): Promise<boolean> {
    return this.testAndAdd(keyToBytes(data))
  }

  /**
   * Remove every key
   */
  async clearAll(): Promise<void> {
    await this.storage.clearAll()
  }

  /**
   * Empirical false-positive rate after storing `n` entries.
   *
   * Clears the filter, adds the 4-byte big-endian integers 0..n-1, then
   * tests FALSE_POSITIVE_ROUNDS integers starting at n+1 and counts the
   * positives. Both phases run with at most ESTIMATE_CONCURRENCY operations
   * in flight, and the test phase starts only after every add finished.
   *
   * Destructive: the filter is left empty, also when an operation fails.
   */
  async estimateFalsePositiveRate(n: number): Promise<number> {
    const count = Math.max(0, Math.floor(n))
    await this.clearAll()

    try {
      await runBounded(count, ESTIMATE_CONCURRENCY, (i) => this.add(uint32Key(i)))

      let falsePositives = 0
      await runBounded(FALSE_POSITIVE_ROUNDS, ESTIMATE_CONCURRENCY, async (i) => {
        if (await this.test(uint32Key(i + count + 1))) {
          falsePositives++
        }
      })

      const rate = falsePositives / FALSE_POSITIVE_ROUNDS
      logger.debug('[BloomFilter] estimated false positive rate', {
        type: this.storage.type,
        n: count,
        m: this.cap(),
        k: this.k(),
        falsePositives,
        rate,
      })
      return rate
    } finally {
      await this.clearAll()
    }
  }
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * In-process filter with `m` bits and `k` hash locations (both floored to 1)
 */
export function newLocal(m: number, k: number): BloomFilter {
  return new BloomFilter(new LocalBitStorage(m, k))
}

export function newLocalWithEstimates(n: number, falsePositiveRate: number): BloomFilter {
  const { m, k } = estimateParameters(n, falsePositiveRate)
  return newLocal(m, k)
}

/**
 * Filter over the Redis bitmap `key`, through an ioredis client. A missing
 * client is accepted here; every operation then rejects with NoBackendError.
 */
export function newIoRedis(
  m: number,
  k: number,
  key: string,
  client: IoRedisClient | null | undefined
): BloomFilter {
  return new BloomFilter(new IoRedisBitStorage(m, k, key, client))
}

export function newIoRedisWithEstimates(
  n: number,
  falsePositiveRate: number,
  key: string,
  client: IoRedisClient | null | undefined
): BloomFilter {
  const { m, k } = estimateParameters(n, falsePositiveRate)
  return newIoRedis(m, k, key, client)
}

/**
 * Filter over the Redis bitmap `key`, through a node-redis client getter
 */
export function newNodeRedis(
  m: number,
  k: number,
  key: string,
  getClient: NodeRedisClientGetter | null | undefined
): BloomFilter {
  return new BloomFilter(new NodeRedisBitStorage(m, k, key, getClient))
}

export function newNodeRedisWithEstimates(
  n: number,
  falsePositiveRate: number,
  key: string,
  getClient: NodeRedisClientGetter | null | undefined
): BloomFilter {
  const { m, k } = estimateParameters(n, falsePositiveRate)
  return newNodeRedis(m, k, key, getClient)
}

// =============================================================================
// Helpers
// =============================================================================

function uint32Key(value: number): Uint8Array {
  const key = new Uint8Array(4)
  new DataView(key.buffer).setUint32(0, value >>> 0)
  return key
}
