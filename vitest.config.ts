import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // PostgreSQL suites run through vitest.integration.config.ts
    exclude: ['**/node_modules/**', 'src/**/*.int.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/infra/http/server.ts', 'src/scripts/**'],
      reporter: ['text', 'html'],
    },
  },
});
