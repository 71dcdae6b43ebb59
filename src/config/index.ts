/**
 * Configuration
 *
 * Reads the SHAREDBLOOM_* and REDIS_URL variables from the environment,
 * optionally merged over a .env file, and validates them into a
 * SharedBloomConfig. Variables set in the environment win over the file;
 * empty values count as unset.
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env, { envFile: '.env' })
 * const clients = await createClients(config)
 * const filter = createBloomFilter(config, clients)
 * ```
 *
 * @module config
 */

import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'dotenv'
import { ConfigurationError } from '../errors'

// =============================================================================
// Types
// =============================================================================

export type BackendType = 'local' | 'ioredis' | 'redis'

export const BACKEND_TYPES: readonly BackendType[] = ['local', 'ioredis', 'redis']

export interface SharedBloomConfig {
  /** Bit storage and cache backend */
  backend: BackendType
  /** Connection URL for the remote backends */
  redisUrl: string | undefined
  /** Redis key of the shared bitmap */
  filterKey: string
  /** Expected number of keys, n */
  capacity: number
  /** Target false-positive rate, p in (0, 1) */
  falsePositiveRate: number
  /** Default cache TTL in seconds (0 = no expiry) */
  cacheTtlSeconds: number
  /** Log through the console logger */
  debug: boolean
}

export type EnvSource = Record<string, string | undefined>

export interface LoadConfigOptions {
  /** Path of a .env file to merge. It must exist. */
  envFile?: string | undefined
}

export const DEFAULT_CONFIG: Readonly<SharedBloomConfig> = {
  backend: 'local',
  redisUrl: undefined,
  filterKey: 'sharedbloom:filter',
  capacity: 100_000,
  falsePositiveRate: 0.01,
  cacheTtlSeconds: 0,
  debug: false,
}

// =============================================================================
// Loading
// =============================================================================

export function loadConfig(env: EnvSource = process.env, options: LoadConfigOptions = {}): SharedBloomConfig {
  const vars: EnvSource = { ...readEnvFile(options.envFile), ...withoutEmpty(env) }

  const config: SharedBloomConfig = {
    backend: parseBackend(vars.SHAREDBLOOM_BACKEND),
    redisUrl: vars.REDIS_URL,
    filterKey: vars.SHAREDBLOOM_FILTER_KEY ?? DEFAULT_CONFIG.filterKey,
    capacity: parseInteger('SHAREDBLOOM_CAPACITY', vars.SHAREDBLOOM_CAPACITY, DEFAULT_CONFIG.capacity, 1),
    falsePositiveRate: parseRate(vars.SHAREDBLOOM_FALSE_POSITIVE_RATE),
    cacheTtlSeconds: parseInteger(
      'SHAREDBLOOM_CACHE_TTL_SECONDS',
      vars.SHAREDBLOOM_CACHE_TTL_SECONDS,
      DEFAULT_CONFIG.cacheTtlSeconds,
      0
    ),
    debug: parseBoolean('SHAREDBLOOM_DEBUG', vars.SHAREDBLOOM_DEBUG, DEFAULT_CONFIG.debug),
  }

  if (config.backend !== 'local' && config.redisUrl === undefined) {
    throw new ConfigurationError(`REDIS_URL is required for the ${config.backend} backend`, 'REDIS_URL')
  }

  return config
}

// =============================================================================
// Helper Functions
// =============================================================================

function readEnvFile(path: string | undefined): EnvSource {
  if (path === undefined) return {}
  if (!existsSync(path)) {
    throw new ConfigurationError(`Env file not found: ${path}`)
  }
  try {
    return withoutEmpty(parse(readFileSync(path)))
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read env file ${path}`,
      undefined,
      error instanceof Error ? error : new Error(String(error))
    )
  }
}

function withoutEmpty(env: EnvSource): EnvSource {
  const result: EnvSource = {}
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[name] = value.trim()
    }
  }
  return result
}

function parseBackend(value: string | undefined): BackendType {
  if (value === undefined) return DEFAULT_CONFIG.backend
  const backend = BACKEND_TYPES.find((type) => type === value.toLowerCase())
  if (!backend) {
    throw new ConfigurationError(
      `SHAREDBLOOM_BACKEND must be one of ${BACKEND_TYPES.join(', ')}, got '${value}'`,
      'SHAREDBLOOM_BACKEND'
    )
  }
  return backend
}

function parseInteger(variable: string, value: string | undefined, fallback: number, min: number): number {
  if (value === undefined) return fallback
  const parsed = Number(value)
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`${variable} must be an integer >= ${min}, got '${value}'`, variable)
  }
  return parsed
}

function parseRate(value: string | undefined): number {
  if (value === undefined) return DEFAULT_CONFIG.falsePositiveRate
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed >= 1) {
    throw new ConfigurationError(
      `SHAREDBLOOM_FALSE_POSITIVE_RATE must be a number in (0, 1), got '${value}'`,
      'SHAREDBLOOM_FALSE_POSITIVE_RATE'
    )
  }
  return parsed
}

function parseBoolean(variable: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true
    case 'false':
    case '0':
    case 'no':
      return false
    default:
      throw new ConfigurationError(`${variable} must be true or false, got '${value}'`, variable)
  }
}
