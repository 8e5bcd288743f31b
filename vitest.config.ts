import { defineConfig } from 'vitest/config';

/**
 * Unit and HTTP tests of every package
 *
 * PostgreSQL tests run separately: npm run test:db
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'packages/*/src/**/__tests__/**/Postgres*.test.ts'],
  },
});
