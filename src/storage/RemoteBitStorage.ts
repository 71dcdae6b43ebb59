/**
 * RemoteBitStorage - Redis bitmap mutated only through Lua scripts
 *
 * Every filter sharing `key` shares one bit array. Each of setAll, testAll
 * and testAddAll is a single script execution, which Redis runs without
 * interleaving any other command, so operations on the same key are
 * linearizable across processes. clearAll deletes the key.
 *
 * Subclasses supply the client transport and the reply coercion. With no
 * client available every call rejects with NoBackendError; transport
 * errors are rethrown unchanged and never retried.
 */

import type { HashQuad } from '../bloom/types'
import { ValidationError } from '../errors'
import type { ScriptExecutor } from '../redis/script'
import { BaseBitStorage } from './BaseBitStorage'
import {
  MAX_REMOTE_BITS,
  MAX_REMOTE_HASHES,
  SET_ALL_SCRIPT,
  TEST_ALL_SCRIPT,
  TEST_ADD_ALL_SCRIPT,
  bitmapScriptArgs,
} from './scripts'

export abstract class RemoteBitStorage extends BaseBitStorage {
  /**
   * @param key - Redis key naming the shared bitmap
   */
  constructor(
    m: number,
    k: number,
    readonly key: string
  ) {
    super(m, k)
    if (typeof key !== 'string' || key.length === 0) {
      throw new ValidationError('Remote bit storage requires a non-empty key', 'key', key)
    }
    if (this.m > MAX_REMOTE_BITS) {
      throw new ValidationError(`Remote bitmaps hold at most 2^32 bits, got m=${this.m}`, 'm', this.m)
    }
    if (this.k > MAX_REMOTE_HASHES) {
      throw new ValidationError(`Remote bit storage supports k <= ${MAX_REMOTE_HASHES}, got k=${this.k}`, 'k', this.k)
    }
  }

  /**
   * Transport for one call; throws NoBackendError when no client is set
   */
  protected abstract executor(operation: string): ScriptExecutor

  /**
   * Interpret a testAll / testAddAll reply (1 = all bits were set)
   */
  protected abstract toFlag(reply: unknown, operation: string): boolean

  protected abstract deleteKey(): Promise<void>

  async setAll(h: HashQuad): Promise<void> {
    const executor = this.executor('setAll')
    await SET_ALL_SCRIPT.run(executor, [this.key], bitmapScriptArgs(this.k, this.m, h))
  }

  async testAll(h: HashQuad): Promise<boolean> {
    const executor = this.executor('testAll')
    const reply = await TEST_ALL_SCRIPT.run(executor, [this.key], bitmapScriptArgs(this.k, this.m, h))
    return this.toFlag(reply, 'testAll')
  }

  async testAddAll(h: HashQuad): Promise<boolean> {
    const executor = this.executor('testAddAll')
    const reply = await TEST_ADD_ALL_SCRIPT.run(executor, [this.key], bitmapScriptArgs(this.k, this.m, h))
    return this.toFlag(reply, 'testAddAll')
  }

  async clearAll(): Promise<void> {
    await this.deleteKey()
  }
}
