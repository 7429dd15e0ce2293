import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Each package runs as its own project with its own setup file
    projects: ['packages/@patchset/*/vitest.config.ts', 'packages/shared-test-utils/vitest.config.ts'],

    // Global test settings
    globals: true,
    environment: 'node',
    testTimeout: 30000,

    // Test file patterns
    include: ['**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/build/**', '**/.{idea,git,cache,output,temp}/**'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        lines: 70,
        functions: 70,
        statements: 70,
        branches: 60,
      },
      exclude: ['**/node_modules/**', '**/dist/**', '**/*.config.ts', '**/__tests__/**', 'benchmark/**'],
    },
  },
});
