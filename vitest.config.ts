import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/*/src/**/__tests__/**/*.test.ts'],
    testTimeout: 10_000,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error',
      OPENAI_API_KEY: 'test-key',
    },
  },
});
