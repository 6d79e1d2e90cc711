import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10_000,
    env: {
      MARKUP_REPAIR_LOG_LEVEL: 'silent',
    },
  },
});
