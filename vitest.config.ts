/**
 * @fileoverview Vitest configuration for every workspace
 *
 * @description
 * One run covers the store package and the scraper app. Tests live in
 * `__tests__` folders beside the code they exercise and only ever touch
 * in-memory or temp-dir SQLite files.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    restoreMocks: true,
  },
})
