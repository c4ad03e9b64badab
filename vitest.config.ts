import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      // Scoring code is pure and table-driven; keep it fully exercised
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 85,
        statements: 90,
      },
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/__tests__/**',
        '**/*.test.ts',
        '**/*.config.*',
        '**/index.ts',
        'tools/**',
      ],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@kpcdst/types': path.resolve(rootDir, 'packages/types/src/index.ts'),
      '@kpcdst/core': path.resolve(rootDir, 'packages/core/src/index.ts'),
      '@kpcdst/domain': path.resolve(rootDir, 'packages/domain/src/index.ts'),
      '@kpcdst/application': path.resolve(rootDir, 'packages/application/src/index.ts'),
    },
  },
});
