import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
    hookTimeout: 30000,
    setupFiles: ['tests/setup.ts'],
    reporters: ['default'],
    pool: 'threads',
    poolOptions: {
      threads: { singleThread: true },
    },
  },
});
