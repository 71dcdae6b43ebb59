/**
 * Bitmap Lua scripts shared by every remote bit storage
 *
 * KEYS[1] is the bitmap key. ARGV is `k, m, h0hi, h0lo, h1hi, h1lo, h2hi,
 * h2lo, h3hi, h3lo`: the four 64-bit base hashes split into 32-bit halves,
 * as decimal text.
 *
 * Lua numbers are doubles, so the 64-bit location arithmetic runs on 32-bit
 * limbs: the wrap mod 2^64 keeps the low 32 bits of the high limb, and the
 * final mod m goes through a mulmod that splits its second operand into
 * 16-bit halves. Every intermediate stays below 2^53 provided m <= 2^32 and
 * k <= 65536. The result equals `location(h, i) % m` from bloom/hashing.
 *
 * @module storage/scripts
 */

import { RedisScript } from '../redis/script'
import type { HashQuad } from '../bloom/types'

/** Largest bitmap a Redis string can hold */
export const MAX_REMOTE_BITS = 2 ** 32

/** Largest k the limb arithmetic supports exactly */
export const MAX_REMOTE_HASHES = 65536

const PRELUDE = `
local key = KEYS[1]
local k, m = tonumber(ARGV[1]), tonumber(ARGV[2])
local h = {}
for j = 0, 3 do
  h[j] = { tonumber(ARGV[3 + 2 * j]), tonumber(ARGV[4 + 2 * j]) }
end
local B32 = 4294967296
local function mulmod(a, b)
  local bh = math.floor(b / 65536)
  return ((a * bh) % m * 65536 + a * (b - bh * 65536)) % m
end
local function location(i)
  local a = h[i % 2]
  local b = h[2 + ((i + (i % 2)) % 4) / 2]
  local lo = a[2] + i * b[2]
  local carry = math.floor(lo / B32)
  lo = lo - carry * B32
  local hi = (a[1] + i * b[1] + carry) % B32
  return (mulmod(hi % m, B32 % m) + lo % m) % m
end
`

export const SET_ALL_SCRIPT = new RedisScript(
  'bloom.setAll',
  `${PRELUDE}
for i = 0, k - 1 do
  redis.call('SETBIT', key, location(i), 1)
end
return k
`
)

export const TEST_ALL_SCRIPT = new RedisScript(
  'bloom.testAll',
  `${PRELUDE}
for i = 0, k - 1 do
  if redis.call('GETBIT', key, location(i)) == 0 then
    return 0
  end
end
return 1
`
)

export const TEST_ADD_ALL_SCRIPT = new RedisScript(
  'bloom.testAddAll',
  `${PRELUDE}
local present = 1
for i = 0, k - 1 do
  if redis.call('SETBIT', key, location(i), 1) == 0 then
    present = 0
  end
end
return present
`
)

const LOW32 = 0xffffffffn

/**
 * ARGV for the bitmap scripts
 */
export function bitmapScriptArgs(k: number, m: number, h: HashQuad): string[] {
  const args = [String(k), String(m)]
  for (const value of h) {
    args.push(String(value >> 32n), String(value & LOW32))
  }
  return args
}
