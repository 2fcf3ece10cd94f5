import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    // Logs from failing tests are still shown
    silent: 'passed-only',
    testTimeout: 20000,
  },
});
