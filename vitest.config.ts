import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    testTimeout: 30000,

    // Setup file to run before tests (env + MSW server)
    setupFiles: ['./tests/setup.ts'],

    include: ['tests/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/worker.ts', '**/*.d.ts'],
    },

    // Global variables for tests
    globals: true,
  },
});
