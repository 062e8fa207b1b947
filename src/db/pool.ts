// =============================================================================
// TRACKWELL — Database Connection Pool
// =============================================================================

import { Pool, PoolClient } from 'pg';
import { errorMessage } from '../types/errors';

export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    console.error('[DB] Unexpected pool error:', err.message);
  });

  return pool;
}

/**
 * Run fn on one client inside BEGIN/COMMIT. Any rejection rolls back and
 * is rethrown.
 */
export async function withTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      console.error('[DB] Rollback failed:', errorMessage(rollbackErr));
    });
    throw err;
  } finally {
    client.release();
  }
}
