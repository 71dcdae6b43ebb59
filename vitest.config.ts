/**
 * Vitest configuration for sharedbloom
 *
 * All tests are in-process unit tests; remote backends run against the
 * Redis stand-in in tests/helpers/fake-redis.ts.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    pool: 'forks',
    fileParallelism: true,
    sequence: {
      shuffle: false, // Keep deterministic order for debugging
    },

    include: ['tests/**/*.test.ts'],

    // The false-positive estimator tests run 100k lookups
    testTimeout: 30000,
  },
})
