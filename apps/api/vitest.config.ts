import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
    setupFiles: ['./test/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: ['**/test/**', '**/*.test.ts', '**/index.ts', '**/*.d.ts'],
    },
  },

  resolve: {
    alias: {
      '@triviaduel/shared-types': path.resolve(__dirname, '../../packages/shared-types/src'),
    },
  },
});
