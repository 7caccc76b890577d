/**
 * FILE PURPOSE: Root Vitest config for the monorepo
 *
 * WHY: One `npm test` at the root runs every workspace's tests.
 *      Packages keep their own config for running in isolation.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    passWithNoTests: false,
    coverage: {
      provider: 'v8',
      include: ['packages/**/src/**/*.ts', 'apps/**/src/**/*.ts'],
      exclude: ['**/index.ts', 'apps/api/src/server.ts', 'apps/api/src/worker.ts'],
    },
  },
});
