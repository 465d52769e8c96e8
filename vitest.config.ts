import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: ['**/__tests__/**', '**/__fixtures__/**', 'dist/**', 'node_modules/**'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    watch: false,
    clearMocks: true,
    restoreMocks: true,
  },
});
