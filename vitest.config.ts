import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    testTimeout: 30000,
    include: ['Shared/tests/**/*.test.ts', 'Calculator/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
});
