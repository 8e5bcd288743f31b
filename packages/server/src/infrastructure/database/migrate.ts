import fs from 'fs/promises';
import type pg from 'pg';

const SCHEMA_FILE = new URL('./schema.sql', import.meta.url);

/**
 * Apply schema.sql (idempotent)
 */
export async function migrate(pool: pg.Pool): Promise<void> {
  const sql = await fs.readFile(SCHEMA_FILE, 'utf-8');
  await pool.query(sql);
  console.log('🗄️  [PostgreSQL] Schema is up to date');
}
