import { readPositiveInteger } from './env.js';

export interface DatabaseConfig {
  connectionString: string;
  maxConnections: number;

  /**
   * Longest wait for a video's advisory lock before the unit of work
   * gives up with UploadInProgressConflictError
   */
  lockTimeoutMillis: number;

  statementTimeoutMillis: number;
}

/**
 * Read the PostgreSQL settings from environment variables
 *
 * DATABASE_URL (required)
 * DATABASE_POOL_SIZE (default 10)
 * DATABASE_LOCK_TIMEOUT_MS (default 15000)
 * DATABASE_STATEMENT_TIMEOUT_MS (default 30000)
 */
export function getDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const connectionString = env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set');
  }

  return {
    connectionString,
    maxConnections: readPositiveInteger(env, 'DATABASE_POOL_SIZE', 10),
    lockTimeoutMillis: readPositiveInteger(env, 'DATABASE_LOCK_TIMEOUT_MS', 15000),
    statementTimeoutMillis: readPositiveInteger(env, 'DATABASE_STATEMENT_TIMEOUT_MS', 30000),
  };
}
