import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/*.test.ts',
      'apps/api/test/**/*.test.ts',
    ],
    testTimeout: 20_000,
  },
});
