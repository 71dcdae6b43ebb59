/**
 * MurmurHash3 x64 128-bit
 *
 * Non-cryptographic, used to derive the base hashes of a bloom filter key.
 * 64-bit lanes are BigInt, wrapped with BigInt.asUintN after every
 * multiply/add.
 */

const MASK64 = 0xffffffffffffffffn
const C1 = 0x87c37b91114253d5n
const C2 = 0x4cf5ad432745937fn

function rotl64(x: bigint, r: bigint): bigint {
  return ((x << r) | (x >> (64n - r))) & MASK64
}

function mul64(a: bigint, b: bigint): bigint {
  return BigInt.asUintN(64, a * b)
}

function add64(a: bigint, b: bigint): bigint {
  return BigInt.asUintN(64, a + b)
}

function fmix64(k: bigint): bigint {
  k ^= k >> 33n
  k = mul64(k, 0xff51afd7ed558ccdn)
  k ^= k >> 33n
  k = mul64(k, 0xc4ceb9fe1a85ec53n)
  k ^= k >> 33n
  return k
}

function mixK1(k1: bigint): bigint {
  k1 = mul64(k1, C1)
  k1 = rotl64(k1, 31n)
  return mul64(k1, C2)
}

function mixK2(k2: bigint): bigint {
  k2 = mul64(k2, C2)
  k2 = rotl64(k2, 33n)
  return mul64(k2, C1)
}

/**
 * Little-endian 64-bit read of up to 8 bytes starting at `offset`
 */
function readLane(data: Uint8Array, offset: number, length: number): bigint {
  let lane = 0n
  for (let i = length - 1; i >= 0; i--) {
    lane = (lane << 8n) | BigInt(data[offset + i])
  }
  return lane
}

/**
 * Hash `data` with a 32-bit `seed`, returning the two 64-bit halves [h1, h2]
 */
export function murmur3x64_128(data: Uint8Array, seed = 0): [bigint, bigint] {
  const len = data.length
  const nblocks = Math.floor(len / 16)
  const s = BigInt(seed >>> 0)
  let h1 = s
  let h2 = s

  for (let i = 0; i < nblocks; i++) {
    const offset = i * 16
    const k1 = readLane(data, offset, 8)
    const k2 = readLane(data, offset + 8, 8)

    h1 ^= mixK1(k1)
    h1 = rotl64(h1, 27n)
    h1 = add64(h1, h2)
    h1 = add64(mul64(h1, 5n), 0x52dce729n)

    h2 ^= mixK2(k2)
    h2 = rotl64(h2, 31n)
    h2 = add64(h2, h1)
    h2 = add64(mul64(h2, 5n), 0x38495ab5n)
  }

  const tailOffset = nblocks * 16
  const tail = len - tailOffset
  if (tail > 8) {
    h2 ^= mixK2(readLane(data, tailOffset + 8, tail - 8))
  }
  if (tail > 0) {
    h1 ^= mixK1(readLane(data, tailOffset, Math.min(tail, 8)))
  }

  const l = BigInt(len)
  h1 ^= l
  h2 ^= l
  h1 = add64(h1, h2)
  h2 = add64(h2, h1)
  h1 = fmix64(h1)
  h2 = fmix64(h2)
  h1 = add64(h1, h2)
  h2 = add64(h2, h1)

  return [h1, h2]
}
