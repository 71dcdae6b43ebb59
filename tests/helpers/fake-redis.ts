/**
 * In-process Redis stand-in
 *
 * FakeRedisServer runs the sharedbloom Lua scripts on a Lua VM (fengari)
 * against an in-memory keyspace, so bit positions and cache fields are
 * exactly what the script text produces. The 'emulated' engine instead
 * runs a JS rendition of each script with the same 32-bit limb
 * arithmetic; it is much faster for tests that make many calls.
 * Scripts have to be loaded by EVAL before EVALSHA finds them, as after a
 * SCRIPT FLUSH.
 *
 * FakeIoRedis and FakeNodeRedis expose the server through the call shapes
 * of the two client libraries.
 *
 * Usage:
 * ```typescript
 * const server = new FakeRedisServer()
 * const filter = newIoRedis(1000, 4, 'bloom', new FakeIoRedis(server))
 * ```
 */

import { createHash } from 'node:crypto'
import type { IoRedisClient, NodeRedisClient, NodeRedisEvalOptions, RedisArg } from '../../src/redis/clients'
import { GET_CACHE_SCRIPT, SET_CACHE_SCRIPT } from '../../src/cache/scripts'
import { SET_ALL_SCRIPT, TEST_ADD_ALL_SCRIPT, TEST_ALL_SCRIPT } from '../../src/storage/scripts'
import { LuaScriptRunner, type LuaCommandReply, type LuaScriptReply } from './lua-runner'

// =============================================================================
// Types
// =============================================================================

export interface FakeCall {
  command: 'evalsha' | 'eval' | 'del'
  /** Script name for evalsha/eval */
  script?: string | undefined
  keys: string[]
}

export type ScriptEngine = 'lua' | 'emulated'

export interface FakeRedisServerOptions {
  /** Default 'lua' */
  engine?: ScriptEngine | undefined
}

interface KnownScript {
  name: string
  source: string
  emulate: ScriptHandler
}

type ScriptHandler = (keys: string[], args: RedisArg[]) => LuaScriptReply

const B32 = 4294967296

// =============================================================================
// Server
// =============================================================================

export class FakeRedisServer {
  readonly calls: FakeCall[] = []
  readonly engine: ScriptEngine

  /** When set, the next script call replies with this instead */
  replyOverride: { value: unknown } | null = null
  /** When set, every command rejects with this error */
  failure: Error | null = null
  /** Reply to bulk string reads with Buffers instead of text */
  returnBuffers = false

  private readonly bitmaps = new Map<string, Uint8Array>()
  private readonly hashes = new Map<string, Map<string, Buffer>>()
  /** Seconds set by the last EXPIRE per key; -1 after PERSIST */
  private readonly expiries = new Map<string, number>()
  /** Script cache: source by SHA1 */
  private readonly loaded = new Map<string, string>()
  private readonly known = new Map<string, KnownScript>()
  private lua: LuaScriptRunner | undefined

  constructor(options: FakeRedisServerOptions = {}) {
    this.engine = options.engine ?? 'lua'
    this.register(SET_ALL_SCRIPT.source, SET_ALL_SCRIPT.name, (keys, args) => this.setAll(keys[0], args))
    this.register(TEST_ALL_SCRIPT.source, TEST_ALL_SCRIPT.name, (keys, args) => this.testAll(keys[0], args))
    this.register(TEST_ADD_ALL_SCRIPT.source, TEST_ADD_ALL_SCRIPT.name, (keys, args) =>
      this.testAddAll(keys[0], args)
    )
    this.register(SET_CACHE_SCRIPT.source, SET_CACHE_SCRIPT.name, (keys, args) => this.setCache(keys[0], args))
    this.register(GET_CACHE_SCRIPT.source, GET_CACHE_SCRIPT.name, (keys) => this.getCache(keys[0]))
  }

  async evalsha(sha1: string, keys: string[], args: RedisArg[]): Promise<unknown> {
    this.calls.push({ command: 'evalsha', script: this.known.get(sha1)?.name, keys })
    this.checkFailure()
    const source = this.loaded.get(sha1)
    if (source === undefined) {
      throw new Error('NOSCRIPT No matching script. Please use EVAL.')
    }
    return this.reply(this.execute(sha1, source, keys, args))
  }

  async eval(source: string, keys: string[], args: RedisArg[]): Promise<unknown> {
    const sha1 = createHash('sha1').update(source).digest('hex')
    this.calls.push({ command: 'eval', script: this.known.get(sha1)?.name, keys })
    this.checkFailure()
    this.loaded.set(sha1, source)
    return this.reply(this.execute(sha1, source, keys, args))
  }

  async del(keys: string[]): Promise<number> {
    this.calls.push({ command: 'del', keys })
    this.checkFailure()
    let removed = 0
    for (const key of keys) {
      const existed = this.bitmaps.delete(key) || this.hashes.delete(key)
      this.expiries.delete(key)
      if (existed) removed++
    }
    return removed
  }

  /** SCRIPT FLUSH */
  flushScripts(): void {
    this.loaded.clear()
  }

  /**
   * Bitmap bytes of `key` (GET), zero-padded to `length` bytes
   */
  bitmap(key: string, length = 0): Uint8Array {
    const stored = this.bitmaps.get(key) ?? new Uint8Array(0)
    const result = new Uint8Array(Math.max(length, stored.length))
    result.set(stored)
    return result
  }

  hasKey(key: string): boolean {
    return this.bitmaps.has(key) || this.hashes.has(key)
  }

  /** Raw `data` field of a cache hash */
  cacheData(key: string): string | undefined {
    return this.hashes.get(key)?.get('data')?.toString('utf8')
  }

  /** Seconds from the last EXPIRE, -1 after PERSIST, undefined if never set */
  expiry(key: string): number | undefined {
    return this.expiries.get(key)
  }

  // ===========================================================================
  // Script execution
  // ===========================================================================

  private register(source: string, name: string, emulate: ScriptHandler): void {
    const sha1 = createHash('sha1').update(source).digest('hex')
    this.known.set(sha1, { name, source, emulate })
  }

  private execute(sha1: string, source: string, keys: string[], args: RedisArg[]): LuaScriptReply {
    if (this.engine === 'emulated') {
      const script = this.known.get(sha1)
      if (!script) throw new Error('ERR unknown script')
      return script.emulate(keys, args)
    }
    this.lua ??= new LuaScriptRunner((command) => this.command(command))
    return this.lua.run(source, keys, args)
  }

  /** redis.call from inside a script */
  private command(args: Buffer[]): LuaCommandReply {
    const [name, key, ...rest] = args.map((arg) => arg.toString('utf8'))
    switch (name?.toUpperCase()) {
      case 'SETBIT':
        return this.setBit(key, bitOffset(rest[0]))
      case 'GETBIT':
        return this.getBit(key, bitOffset(rest[0])) ? 1 : 0
      case 'HSET': {
        let added = 0
        for (let i = 2; i + 1 < args.length; i += 2) {
          if (this.hset(key, args[i].toString('utf8'), args[i + 1])) added++
        }
        return added
      }
      case 'HGET':
        return this.hashes.get(key)?.get(rest[0]) ?? null
      case 'EXPIRE':
        this.expiries.set(key, Number(rest[0]))
        return 1
      case 'PERSIST':
        this.expiries.set(key, -1)
        return 1
      default:
        throw new Error(`ERR unknown command '${name}'`)
    }
  }

  // ===========================================================================
  // Script emulation
  // ===========================================================================

  private setAll(key: string, args: RedisArg[]): number {
    const { k, positions } = bitmapPositions(args)
    for (const position of positions) this.setBit(key, position)
    return k
  }

  private testAll(key: string, args: RedisArg[]): number {
    const { positions } = bitmapPositions(args)
    return positions.every((position) => this.getBit(key, position)) ? 1 : 0
  }

  private testAddAll(key: string, args: RedisArg[]): number {
    const { positions } = bitmapPositions(args)
    let present = 1
    for (const position of positions) {
      if (this.setBit(key, position) === 0) present = 0
    }
    return present
  }

  private setCache(key: string, args: RedisArg[]): number {
    const [value, exp] = args
    const expire = Number(String(exp))
    this.hset(key, 'data', typeof value === 'string' ? Buffer.from(value, 'utf8') : Buffer.from(value))
    this.hset(key, 'exp', Buffer.from(String(expire), 'utf8'))
    this.expiries.set(key, expire !== 0 ? expire : -1)
    return 1
  }

  private getCache(key: string): Buffer | null {
    const hash = this.hashes.get(key)
    const data = hash?.get('data')
    if (!hash || !data) return null
    const expire = Number(hash.get('exp')?.toString('utf8'))
    if (expire !== 0) this.expiries.set(key, expire)
    return Buffer.from(data)
  }

  // ===========================================================================
  // Keyspace
  // ===========================================================================

  /** SETBIT key position 1, returning the previous bit */
  private setBit(key: string, position: number): number {
    const byte = Math.floor(position / 8)
    let bitmap = this.bitmaps.get(key) ?? new Uint8Array(0)
    if (bitmap.length <= byte) {
      const grown = new Uint8Array(byte + 1)
      grown.set(bitmap)
      bitmap = grown
    }
    this.bitmaps.set(key, bitmap)
    const mask = 0x80 >> position % 8
    const previous = (bitmap[byte] & mask) !== 0 ? 1 : 0
    bitmap[byte] |= mask
    return previous
  }

  private getBit(key: string, position: number): boolean {
    const bitmap = this.bitmaps.get(key)
    const byte = Math.floor(position / 8)
    if (!bitmap || byte >= bitmap.length) return false
    return (bitmap[byte] & (0x80 >> position % 8)) !== 0
  }

  /** HSET of one field, true when the field is new */
  private hset(key: string, field: string, value: Buffer): boolean {
    let hash = this.hashes.get(key)
    if (!hash) {
      hash = new Map()
      this.hashes.set(key, hash)
    }
    const added = !hash.has(field)
    hash.set(field, Buffer.from(value))
    return added
  }

  private checkFailure(): void {
    if (this.failure) throw this.failure
  }

  private reply(value: LuaScriptReply): unknown {
    if (this.replyOverride) {
      const { value: override } = this.replyOverride
      this.replyOverride = null
      return override
    }
    if (Buffer.isBuffer(value) && !this.returnBuffers) {
      return value.toString('utf8')
    }
    return value
  }
}

/**
 * SETBIT/GETBIT offset argument, as Redis validates it
 */
function bitOffset(raw: string | undefined): number {
  const offset = raw !== undefined && /^\d+$/.test(raw) ? Number(raw) : NaN
  if (!(offset < B32)) {
    throw new Error('ERR bit offset is not an integer or out of range')
  }
  return offset
}

/**
 * The script prelude, in doubles: `location(i) % m` for i in [0, k)
 */
export function bitmapPositions(raw: RedisArg[]): { k: number; positions: number[] } {
  const args = raw.map(String)
  const k = Number(args[0])
  const m = Number(args[1])
  const h: Array<[number, number]> = []
  for (let j = 0; j < 4; j++) {
    h.push([Number(args[2 + 2 * j]), Number(args[3 + 2 * j])])
  }

  const mulmod = (a: number, b: number): number => {
    const bh = Math.floor(b / 65536)
    return ((((a * bh) % m) * 65536 + a * (b - bh * 65536)) % m)
  }

  const positions: number[] = []
  for (let i = 0; i < k; i++) {
    const a = h[i % 2]
    const b = h[2 + ((i + (i % 2)) % 4) / 2]
    let lo = a[1] + i * b[1]
    const carry = Math.floor(lo / B32)
    lo = lo - carry * B32
    const hi = (a[0] + i * b[0] + carry) % B32
    positions.push((mulmod(hi % m, B32 % m) + (lo % m)) % m)
  }
  return { k, positions }
}

// =============================================================================
// Client facades
// =============================================================================

export class FakeIoRedis implements IoRedisClient {
  constructor(readonly server: FakeRedisServer) {}

  async evalsha(sha1: string, numkeys: number, ...args: RedisArg[]): Promise<unknown> {
    return this.server.evalsha(sha1, args.slice(0, numkeys).map(String), args.slice(numkeys))
  }

  async eval(script: string, numkeys: number, ...args: RedisArg[]): Promise<unknown> {
    return this.server.eval(script, args.slice(0, numkeys).map(String), args.slice(numkeys))
  }

  async del(...keys: string[]): Promise<number> {
    return this.server.del(keys)
  }
}

export class FakeNodeRedis implements NodeRedisClient {
  constructor(readonly server: FakeRedisServer) {}

  async evalSha(sha1: string, options: NodeRedisEvalOptions): Promise<unknown> {
    return this.server.evalsha(sha1, options.keys, options.arguments)
  }

  async eval(script: string, options: NodeRedisEvalOptions): Promise<unknown> {
    return this.server.eval(script, options.keys, options.arguments)
  }

  async del(keys: string | string[]): Promise<number> {
    return this.server.del(typeof keys === 'string' ? [keys] : keys)
  }
}
