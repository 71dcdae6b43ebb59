/**
 * sharedbloom
 *
 * Bloom filters over in-process or Redis-backed bit storage, plus a small
 * TTL cache with the same backends.
 *
 * @packageDocumentation
 */

// =============================================================================
// Bloom Filter
// =============================================================================

export {
  BloomFilter,
  FALSE_POSITIVE_ROUNDS,
  ESTIMATE_CONCURRENCY,
  newLocal,
  newLocalWithEstimates,
  newIoRedis,
  newIoRedisWithEstimates,
  newNodeRedis,
  newNodeRedisWithEstimates,
} from './bloom/BloomFilter'
export { estimateParameters } from './bloom/estimate'
export { baseHashes, bitIndex, bitIndexes, keyToBytes, location } from './bloom/hashing'
export type { BitStorage, BloomKey, FilterParameters, HashQuad } from './bloom/types'
export { murmur3x64_128 } from './hash/murmur3'

// =============================================================================
// Bit Storage
// =============================================================================

export { BaseBitStorage } from './storage/BaseBitStorage'
export { LocalBitStorage } from './storage/LocalBitStorage'
export { RemoteBitStorage } from './storage/RemoteBitStorage'
export { IoRedisBitStorage } from './storage/IoRedisBitStorage'
export { NodeRedisBitStorage } from './storage/NodeRedisBitStorage'
export { MAX_REMOTE_BITS, MAX_REMOTE_HASHES } from './storage/scripts'

// =============================================================================
// Redis
// =============================================================================

export type {
  IoRedisClient,
  NodeRedisClient,
  NodeRedisClientGetter,
  NodeRedisEvalOptions,
  RedisArg,
} from './redis/clients'
export { RedisScript, isNoScriptError } from './redis/script'
export type { ScriptExecutor } from './redis/script'

// =============================================================================
// Cache
// =============================================================================

export { Cache } from './cache/Cache'
export { LocalCache, DEFAULT_SWEEP_SECONDS } from './cache/LocalCache'
export type { CacheExpireCallback, LocalCacheOptions } from './cache/LocalCache'
export { RemoteCache } from './cache/RemoteCache'
export { IoRedisCache } from './cache/IoRedisCache'
export { NodeRedisCache } from './cache/NodeRedisCache'
export type { CacheStore, CacheStoreOptions, CacheValue } from './cache/types'

// =============================================================================
// Configuration
// =============================================================================

export { loadConfig, DEFAULT_CONFIG, BACKEND_TYPES } from './config'
export type { BackendType, EnvSource, LoadConfigOptions, SharedBloomConfig } from './config'
export { configureLogging, createClients, createBloomFilter, createCache } from './factory'
export type { CreateCacheOptions, SharedBloomClients } from './factory'

// =============================================================================
// Errors & Utilities
// =============================================================================

export {
  ErrorCode,
  SharedBloomError,
  NoBackendError,
  DataTypeError,
  ValidationError,
  ConfigurationError,
  isSharedBloomError,
  isNoBackendError,
  isDataTypeError,
} from './errors'
export type { SerializedError } from './errors'
export { logger, setLogger, consoleLogger, noopLogger, createConsoleLogger } from './utils/logger'
export type { Logger, LogLevel } from './utils/logger'
export { Semaphore, runBounded } from './utils/semaphore'
export { jitterTtl, defaultRandomSource } from './utils/random'
export type { RandomSource } from './utils/random'
