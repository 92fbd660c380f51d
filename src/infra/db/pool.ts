import pg from 'pg';
import type { Pool, PoolClient } from 'pg';
import { describeError, logger } from '../logger.js';

/** Build the process-wide pool from the validated connection string. */
export function createPool(connectionString: string): Pool {
  const pool = new pg.Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('db', 'Database connection established');
  });

  pool.on('error', (err) => {
    logger.error('db', 'Unexpected database error', describeError(err));
  });

  return pool;
}

/**
 * Check out one client for a unit of work and always give it back, on
 * success and on error alike.
 */
export async function withClient<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

/** Postgres unique_violation. */
export function isUniqueViolation(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === '23505'
  );
}
