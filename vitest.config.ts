import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      ISSUE_OPERATOR_LOG_LEVEL: 'silent',
    },
    testTimeout: 10000,
  },
});
