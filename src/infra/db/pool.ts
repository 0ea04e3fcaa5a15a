import pg from 'pg';
import { getLogger } from '../logger.js';

const { Pool } = pg;

const logger = getLogger('db');

/**
 * Create the connection pool. The caller owns it and passes it to every
 * repository; nothing reaches for a module-level pool.
 */
export function createPool(connectionString: string): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}
