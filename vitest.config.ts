import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30_000,
    env: {
      NODE_ENV: 'test',
      LOG_SILENT: 'true',
    },
  },
});
