import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    // Include only .test.ts files
    include: ['**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Keep test output clean; logger.ts also defaults to silent under NODE_ENV=test
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
