import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@pairmatch/types': fromRoot('./packages/types/src/index.ts'),
      '@pairmatch/core': fromRoot('./packages/core/src/index.ts'),
      '@pairmatch/domain': fromRoot('./packages/domain/src/index.ts'),
      '@pairmatch/application': fromRoot('./packages/application/src/index.ts'),
      '@pairmatch/infrastructure': fromRoot('./packages/infrastructure/src/index.ts'),
    },
  },
});
