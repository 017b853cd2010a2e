import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: [
      'src/**/*.test.ts',
      'src/**/__tests__/**/*.test.ts',
      'test/**/*.spec.ts',
    ],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/**/__tests__/**'],
    },
    // Configuration for property-based testing with fast-check
    testTimeout: 10000, // 10 seconds for property tests
    env: {
      TEST_SEED: '424242',
      FC_NUM_RUNS: process.env.CI === 'true' ? '1000' : '100',
    },
  },
});
