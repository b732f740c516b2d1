import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['api/__tests__/**/*.test.ts', 'src/__tests__/**/*.test.{ts,tsx}'],
    environment: 'node',
    testTimeout: 10000,
    sequence: {
      concurrent: false,
    },
  },
});
