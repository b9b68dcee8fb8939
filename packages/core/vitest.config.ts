import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts', 'test/**/*.spec.ts'],
    setupFiles: ['../../test/setup.ts'],
    testTimeout: 10000,
    retry: 0,
  },
});
