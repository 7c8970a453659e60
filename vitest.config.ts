import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['sdk/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
