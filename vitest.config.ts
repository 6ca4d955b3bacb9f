import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * wordhop test configuration
 *
 * - One run over every workspace package
 * - Deterministic property tests (fixed fast-check seed from test/setup.ts)
 * - No retries, so flaky behaviour surfaces immediately
 */

// Windows uses threads; Unix-like systems use forks for better isolation
const pool = process.platform === 'win32' ? 'threads' : 'forks';

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  resolve: {
    alias: {
      '@wordhop/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    pool,
    setupFiles: ['./test/setup.ts'],

    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    retry: 0,
    fileParallelism: !isCI,

    // BFS over the full four-letter space takes a while on slow machines
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
