/**
 * NodeRedisCache - RemoteCache over a node-redis client getter
 */

import { NoBackendError } from '../errors'
import { type NodeRedisClient, type NodeRedisClientGetter, nodeRedisExecutor } from '../redis/clients'
import type { ScriptExecutor } from '../redis/script'
import { RemoteCache } from './RemoteCache'
import type { CacheStoreOptions } from './types'

export class NodeRedisCache extends RemoteCache {
  readonly type = 'redis'

  constructor(
    private readonly getClient: NodeRedisClientGetter | null | undefined,
    options: CacheStoreOptions = {}
  ) {
    super(options)
  }

  protected executor(operation: string): ScriptExecutor {
    return nodeRedisExecutor(this.requireClient(operation))
  }

  protected async deleteKey(key: string, operation: string): Promise<void> {
    await this.requireClient(operation).del(key)
  }

  private requireClient(operation: string): NodeRedisClient {
    const client = this.getClient?.()
    if (!client) {
      throw new NoBackendError(operation, this.type)
    }
    return client
  }
}
