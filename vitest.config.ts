import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@checkwalk/shared': path.resolve(__dirname, 'packages/shared/src/index.ts'),
      '@checkwalk/scanner': path.resolve(__dirname, 'packages/scanner/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
