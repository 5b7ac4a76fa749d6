import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    // Key generation and signing are CPU-bound; keep the default timeout generous
    testTimeout: 30000,
    // Show detailed output
    reporters: ['default'],
  },
});
