import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    testTimeout: 15000,
    // Database tests write temp files; keep them sequential
    sequence: {
      concurrent: false,
    },
  },
});
