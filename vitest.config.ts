import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration.
 *
 * Every workspace package is its own project; `vitest run` at the root runs
 * them all once and exits.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',

    // No retries - surface issues immediately
    retry: 0,

    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/types.ts',
      ],
    },

    projects: ['packages/*'],

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '500' : '100',
    },
  },
});
