/**
 * The slices of the two supported Redis clients that sharedbloom calls.
 *
 * - IoRedisClient: an `ioredis` Redis or Cluster instance, passed directly.
 * - NodeRedisClient: a `redis` (node-redis) client, reached through a getter
 *   so callers can hand out pooled or lazily created connections.
 *
 * @module redis/clients
 */

import type { ScriptExecutor } from './script'

export type RedisArg = string | Buffer

export interface IoRedisClient {
  evalsha(sha1: string, numkeys: number, ...args: RedisArg[]): Promise<unknown>
  eval(script: string, numkeys: number, ...args: RedisArg[]): Promise<unknown>
  del(...keys: string[]): Promise<number>
}

export interface NodeRedisEvalOptions {
  keys: string[]
  arguments: RedisArg[]
}

export interface NodeRedisClient {
  evalSha(sha1: string, options: NodeRedisEvalOptions): Promise<unknown>
  eval(script: string, options: NodeRedisEvalOptions): Promise<unknown>
  del(keys: string | string[]): Promise<number>
}

/**
 * Returns the client to use for one call, or nothing when no connection is
 * configured
 */
export type NodeRedisClientGetter = () => NodeRedisClient | null | undefined

export function ioRedisExecutor(client: IoRedisClient): ScriptExecutor {
  return {
    evalsha: (sha1, keys, args) => client.evalsha(sha1, keys.length, ...keys, ...args),
    eval: (source, keys, args) => client.eval(source, keys.length, ...keys, ...args),
  }
}

export function nodeRedisExecutor(client: NodeRedisClient): ScriptExecutor {
  return {
    evalsha: (sha1, keys, args) => client.evalSha(sha1, { keys, arguments: args }),
    eval: (source, keys, args) => client.eval(source, { keys, arguments: args }),
  }
}
