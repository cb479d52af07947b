import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/tests/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
