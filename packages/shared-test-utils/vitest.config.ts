import { defineConfig } from 'vitest/config';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@patchset/core': resolve(__dirname, '../@patchset/core/src/index.ts'),
    },
  },
  test: {
    name: '@patchset/test-utils',
    root: __dirname,

    globals: true,
    environment: 'node',
    include: ['examples/**/*.test.ts', 'src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
