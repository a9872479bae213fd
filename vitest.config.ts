import { defineConfig } from 'vitest/config';

/**
 * ratiofit test configuration
 *
 * - Fixed execution order, no retries
 * - Platform-specific pool (threads on Windows, forks elsewhere)
 * - Seeded property tests through TEST_SEED / FC_NUM_RUNS
 */

const getPoolConfig = () => {
  const pool: 'threads' | 'forks' = process.platform === 'win32' ? 'threads' : 'forks';

  return {
    pool,
    poolOptions: {
      threads: {
        singleThread: false,
        isolate: true,
      },
      forks: {
        isolate: true,
      },
    },
  };
};

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',

    ...getPoolConfig(),

    // Every package in the monorepo
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    fileParallelism: !isCI,

    // Property tests run up to FC_NUM_RUNS cases per property
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/test-utils/**',
      ],
      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
