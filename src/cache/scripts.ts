/**
 * Cache Lua scripts shared by the remote cache stores
 *
 * Each cached key is a hash `{ data, exp }`. SET writes both and applies
 * EXPIRE (or PERSIST for exp = 0); GET returns `data` and re-applies the
 * stored `exp`, giving a sliding TTL.
 *
 * @module cache/scripts
 */

import { RedisScript } from '../redis/script'

export const SET_CACHE_SCRIPT = new RedisScript(
  'cache.set',
  `
local key, value, expire = KEYS[1], ARGV[1], tonumber(ARGV[2])
redis.call('HSET', key, 'data', value, 'exp', expire)
if expire ~= 0 then
  redis.call('EXPIRE', key, expire)
else
  redis.call('PERSIST', key)
end
return 1
`
)

export const GET_CACHE_SCRIPT = new RedisScript(
  'cache.get',
  `
local key = KEYS[1]
local value = redis.call('HGET', key, 'data')
local expire = tonumber(redis.call('HGET', key, 'exp'))
if value and expire and expire ~= 0 then
  redis.call('EXPIRE', key, expire)
end
return value
`
)
