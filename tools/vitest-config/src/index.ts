import type { UserConfig } from 'vitest/config';

/**
 * Shared Vitest settings for every workspace package.
 *
 * Tests live beside their sources as `*.test.ts`. Each package passes its own
 * `name` so the root `projects` run labels results per package.
 */
export const defineConfig = (
  name: string,
  options: UserConfig = {},
): UserConfig => {
  return {
    ...options,
    test: {
      name,
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
        include: ['src/**/*.ts'],
        exclude: ['**/index.ts', 'src/types.ts'],
      },
      ...options.test,
    },
  };
};
