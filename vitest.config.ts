/**
 * @fileoverview Vitest configuration for every workspace package
 *
 * @description
 * Runs the unit tests that live beside sources in `__tests__` folders.
 * Logging is silenced so test output stays readable.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
})
