import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Keep test output quiet unless a test opts in
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
