import pg from 'pg';

const { Pool } = pg;

/**
 * Build the connection pool. Nothing connects until the first query,
 * so a missing database only surfaces when the pool is used.
 */
export function createPool(connectionString: string): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    console.log('Database connection established');
  });

  pool.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return pool;
}
