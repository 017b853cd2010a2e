import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration: every package is a project with its own
 * include patterns. Property tests read FC_NUM_RUNS / TEST_SEED.
 */

// Unix-like systems use forks for better isolation
const pool = process.platform === 'win32' ? 'threads' : 'forks';
const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    pool,

    // Projects configuration for monorepo - each package is a project
    projects: ['packages/*'],

    // No retries - surface issues immediately
    retry: 0,
    testTimeout: isCI ? 30000 : 10000,

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
