import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.test.ts'],
    // Suites share one database and its append-only event log
    pool: 'forks',
    fileParallelism: false,
    testTimeout: 20000,
    hookTimeout: 30000,
  },
});
