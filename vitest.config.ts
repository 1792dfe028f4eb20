import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'node_modules/**',
        '**/dist/**',
        '**/*.test.ts',
        '**/test-helpers.ts',
        'vitest.config.ts',
        'packages/*/src/index.ts', // Entry point, starts the CLI
        'packages/*/src/types.ts', // Type definitions only
      ],
    },
  },
});
