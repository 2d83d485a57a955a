import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for Wayfarer
 *
 * Every suite runs in process against the memory stores and stub providers.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
