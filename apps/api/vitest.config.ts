/**
 * Workspace-level Vitest config for @fhir-intake/api
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
  },
});
