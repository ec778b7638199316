import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
    env: {
      NODE_ENV: 'test',
    },
  },
});
