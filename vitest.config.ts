import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Silences console output from the scoped loggers
    setupFiles: ['./tests/setup.ts'],

    include: ['**/__tests__/**/*.test.ts', '**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    testTimeout: 30000,

    clearMocks: true,
    restoreMocks: true,
  },
});
