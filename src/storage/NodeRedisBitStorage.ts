/**
 * NodeRedisBitStorage - remote bitmap over a node-redis client getter
 *
 * The getter is called once per operation, so it can hand out a pooled
 * connection or return nothing while disconnected. Replies go through the
 * generic toInteger coercion.
 */

import { NoBackendError } from '../errors'
import { type NodeRedisClient, type NodeRedisClientGetter, nodeRedisExecutor } from '../redis/clients'
import { toInteger } from '../redis/reply'
import type { ScriptExecutor } from '../redis/script'
import { RemoteBitStorage } from './RemoteBitStorage'

export class NodeRedisBitStorage extends RemoteBitStorage {
  readonly type = 'redis'

  constructor(
    m: number,
    k: number,
    key: string,
    private readonly getClient: NodeRedisClientGetter | null | undefined
  ) {
    super(m, k, key)
  }

  protected executor(operation: string): ScriptExecutor {
    return nodeRedisExecutor(this.requireClient(operation))
  }

  protected toFlag(reply: unknown, operation: string): boolean {
    return toInteger(reply, operation) === 1
  }

  protected async deleteKey(): Promise<void> {
    await this.requireClient('clearAll').del(this.key)
  }

  private requireClient(operation: string): NodeRedisClient {
    const client = this.getClient?.()
    if (!client) {
      throw new NoBackendError(operation, this.type)
    }
    return client
  }
}
