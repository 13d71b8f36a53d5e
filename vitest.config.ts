import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@reconciler/agents': path.resolve(root, 'agents/src'),
      '@reconciler/core': path.resolve(root, 'packages/core/src'),
      '@reconciler/schemas': path.resolve(root, 'packages/schemas/src'),
    },
  },
});
