/**
 * Optimal bloom filter sizing
 *
 * @module bloom/estimate
 */

import type { FilterParameters } from './types'

/**
 * Estimate m (bits) and k (hash count) for `n` items at false-positive
 * target `p`:
 *
 *   m = ceil(-n * ln(p) / (ln 2)^2)
 *   k = ceil(ln(2) * m / n)
 *
 * Degenerate inputs (n <= 0, p outside (0, 1)) can produce 0 for either
 * value; the filter constructors floor both to 1.
 */
export function estimateParameters(n: number, p: number): FilterParameters {
  const m = toCount((-n * Math.log(p)) / (Math.LN2 * Math.LN2))
  const k = toCount((Math.LN2 * m) / n)
  return { m, k }
}

function toCount(x: number): number {
  return Number.isFinite(x) && x > 0 ? Math.ceil(x) : 0
}

/**
 * Floor a filter parameter to a positive integer
 */
export function atLeastOne(value: number): number {
  return Number.isFinite(value) && value >= 1 ? Math.floor(value) : 1
}
