import pg from 'pg';
import type { DatabaseConfig } from '../config/databaseConfig.js';
import { getDatabaseConfig } from '../config/databaseConfig.js';

const APPLICATION_NAME = 'clipvault-upload-server';

/**
 * Pool whose sessions carry the lock and statement timeouts the upload
 * unit of work depends on
 */
export function createPool(config: DatabaseConfig): pg.Pool {
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    max: config.maxConnections,
    application_name: APPLICATION_NAME,
    lock_timeout: config.lockTimeoutMillis,
    statement_timeout: config.statementTimeoutMillis,
    // A unit of work never idles inside its transaction
    idle_in_transaction_session_timeout: config.statementTimeoutMillis,
  });

  pool.on('error', (err) => {
    console.error('❌ [PostgreSQL] Idle client error:', err);
  });

  return pool;
}

let pool: pg.Pool | null = null;

/**
 * Process-wide pool built from getDatabaseConfig()
 */
export function getPool(): pg.Pool {
  if (!pool) {
    pool = createPool(getDatabaseConfig());
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) {
    return;
  }
  const closing = pool;
  pool = null;
  await closing.end();
}
