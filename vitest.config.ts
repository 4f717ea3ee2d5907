import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['shared/src/**/*.test.ts', 'client/src/**/*.test.ts'],
    testTimeout: 10000,
  },
});
