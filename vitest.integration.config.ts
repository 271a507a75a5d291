import { defineConfig } from 'vitest/config';

// Needs DATABASE_URL; suites skip themselves without it.
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'],
    pool: 'forks',
    // Suites share one database; run them one at a time.
    fileParallelism: false,
    env: {
      NODE_ENV: 'test',
    },
  },
});
