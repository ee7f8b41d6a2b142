import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const resolvePackage = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
    },
  },
  resolve: {
    alias: {
      '@nestedtx/core': resolvePackage('core'),
      '@nestedtx/mysql': resolvePackage('mysql'),
      '@nestedtx/postgresql': resolvePackage('postgresql'),
    },
  },
});
