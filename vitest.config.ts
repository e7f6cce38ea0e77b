import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'shared/*/src/**/*.test.ts',
      'shared/*/tests/**/*.test.ts',
      'services/*/tests/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 15_000,
  },
});
