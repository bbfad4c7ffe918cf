import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/__mocks__/**', 'src/bin/**', 'src/index.ts'],
    },

    testTimeout: 10000,
    watch: false,

    clearMocks: true,
    restoreMocks: true,
  },
});
