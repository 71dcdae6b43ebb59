/**
 * IoRedisCache - RemoteCache over an ioredis client
 */

import { NoBackendError } from '../errors'
import { type IoRedisClient, ioRedisExecutor } from '../redis/clients'
import type { ScriptExecutor } from '../redis/script'
import { RemoteCache } from './RemoteCache'
import type { CacheStoreOptions } from './types'

export class IoRedisCache extends RemoteCache {
  readonly type = 'ioredis'

  constructor(
    private readonly client: IoRedisClient | null | undefined,
    options: CacheStoreOptions = {}
  ) {
    super(options)
  }

  protected executor(operation: string): ScriptExecutor {
    return ioRedisExecutor(this.requireClient(operation))
  }

  protected async deleteKey(key: string, operation: string): Promise<void> {
    await this.requireClient(operation).del(key)
  }

  private requireClient(operation: string): IoRedisClient {
    if (!this.client) {
      throw new NoBackendError(operation, this.type)
    }
    return this.client
  }
}
