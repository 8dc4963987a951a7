import { defineConfig } from 'vitest/config';

/**
 * qoslens - Vitest Configuration
 *
 * - Fixed execution order and no retries so failures surface immediately
 * - Platform-specific pool configuration
 * - Property-based tests driven by FC_NUM_RUNS
 */

// Windows uses threads, Unix-like systems use forks for better isolation
const getPoolConfig = () => {
  const pool = process.platform === 'win32' ? 'threads' : 'forks';

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

    // All workspace packages
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    fileParallelism: !isCI,

    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    reporters: ['default'],
    silent: false,

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/types.ts',
      ],
    },

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
