import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@bankcsv/types': path.resolve(rootDir, 'packages/types/src/index.ts'),
      '@bankcsv/current-account': path.resolve(rootDir, 'packages/current-account/src/index.ts'),
      '@bankcsv/output': path.resolve(rootDir, 'packages/output/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
