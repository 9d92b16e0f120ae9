import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['integration-tests/tests/**/*.test.ts'],
    testTimeout: 30000,
    env: {
      NODE_ENV: 'test',
    },
  },
});
