import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['server/src/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
