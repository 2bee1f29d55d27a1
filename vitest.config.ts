import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@shared': path.resolve(rootDir, 'packages/shared/src'),
      '@server': path.resolve(rootDir, 'packages/server/src'),
    },
  },
});
