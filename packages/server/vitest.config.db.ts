import { defineConfig } from 'vitest/config';

/**
 * Vitest config for the PostgreSQL integration tests
 *
 * Run: npm run test:db -w @clipvault/server
 * Requires TEST_DATABASE_URL (defaults to a local clipvault_test database)
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/Postgres*.test.ts'],
    // The tests share tables, so files must not run in parallel
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
  },
});
