import { defineConfig } from './tools/vitest-config/src/index';

export default defineConfig({
  test: {
    include: [
      'packages/*/src/**/*.{test,spec}.ts',
      'tools/*/src/**/*.{test,spec}.ts',
    ],
    coverage: {
      include: ['packages/*/src/**/*.ts', 'tools/*/src/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        '**/index.ts', // Re-exports only
        'packages/model/src/**', // Type definitions only
        'tools/vitest-config/src/**',
      ],
    },
  },
});
