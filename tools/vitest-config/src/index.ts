import type { UserConfig } from 'vitest/config';

type TestOptions = NonNullable<UserConfig['test']>;

export interface BaseConfigOptions extends Omit<UserConfig, 'test'> {
  test?: Omit<TestOptions, 'coverage'> & {
    coverage?: {
      include?: string[];
      exclude?: string[];
    };
  };
}

export const defineConfig = (options: BaseConfigOptions = {}): UserConfig => {
  const { test, ...rest } = options;
  const { coverage, ...testOptions } = test ?? {};

  return {
    ...rest,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: coverage?.include ?? ['src/**/*.ts'],
        exclude: coverage?.exclude ?? ['**/index.ts'],
        thresholds: {
          lines: 90,
          functions: 90,
          branches: 90,
          statements: 90,
        },
      },
      ...testOptions,
    },
  };
};
