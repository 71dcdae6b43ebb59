/**
 * IoRedisBitStorage - remote bitmap over an ioredis client
 *
 * Script replies must be RESP integers (JS numbers); anything else is a
 * DataTypeError.
 */

import { NoBackendError } from '../errors'
import { type IoRedisClient, ioRedisExecutor } from '../redis/clients'
import { expectInteger } from '../redis/reply'
import type { ScriptExecutor } from '../redis/script'
import { RemoteBitStorage } from './RemoteBitStorage'

export class IoRedisBitStorage extends RemoteBitStorage {
  readonly type = 'ioredis'

  constructor(
    m: number,
    k: number,
    key: string,
    private readonly client: IoRedisClient | null | undefined
  ) {
    super(m, k, key)
  }

  protected executor(operation: string): ScriptExecutor {
    return ioRedisExecutor(this.requireClient(operation))
  }

  protected toFlag(reply: unknown, operation: string): boolean {
    return expectInteger(reply, operation) === 1
  }

  protected async deleteKey(): Promise<void> {
    await this.requireClient('clearAll').del(this.key)
  }

  private requireClient(operation: string): IoRedisClient {
    if (!this.client) {
      throw new NoBackendError(operation, this.type)
    }
    return this.client
  }
}
