import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 10000,
    poolOptions: {
      threads: {
        maxThreads: 4,
      },
    },
  },
});
