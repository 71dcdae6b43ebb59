/**
 * Server-side Lua scripts, run EVALSHA-first
 *
 * A RedisScript is sent by SHA1 digest; when the server replies NOSCRIPT
 * (script cache flushed, new node, first call) it is re-sent in full with
 * EVAL, which also loads it for later calls.
 *
 * @module redis/script
 */

import { createHash } from 'node:crypto'
import { logger } from '../utils/logger'

/**
 * Client-neutral EVAL/EVALSHA transport. Each client binding adapts its own
 * call signatures to this shape (see redis/clients).
 */
export interface ScriptExecutor {
  evalsha(sha1: string, keys: string[], args: Array<string | Buffer>): Promise<unknown>
  eval(source: string, keys: string[], args: Array<string | Buffer>): Promise<unknown>
}

export class RedisScript {
  readonly sha1: string

  constructor(
    readonly name: string,
    readonly source: string
  ) {
    this.sha1 = createHash('sha1').update(source).digest('hex')
  }

  async run(executor: ScriptExecutor, keys: string[], args: Array<string | Buffer>): Promise<unknown> {
    try {
      return await executor.evalsha(this.sha1, keys, args)
    } catch (error) {
      if (!isNoScriptError(error)) throw error
      logger.debug(`[RedisScript] ${this.name} not cached on server, sending source`, { sha1: this.sha1 })
      return executor.eval(this.source, keys, args)
    }
  }
}

export function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.startsWith('NOSCRIPT')
}
