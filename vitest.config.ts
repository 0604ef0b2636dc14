import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  cacheDir: '.vite-cache',
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30_000,
    hookTimeout: 30_000,
    globals: true,
    // Diagnostics from the code under test stay out of the repo root
    env: {
      TICKLOG_DEBUG_DIR: '.tmp-test-workspaces/debug',
    },
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: true, // e2e tests spawn the CLI and count real seconds
      },
    },
  },
  plugins: [tsconfigPaths()],
});
