import pg from 'pg';
import { logger } from '../logger.js';

const { Pool } = pg;

export interface PoolOptions {
  databaseUrl: string;
  connectivityTimeoutMs: number;
}

/**
 * Creates the pool lazily from the container; nothing connects until the
 * first query.
 */
export function createPool(options: PoolOptions): pg.Pool {
  const pool = new Pool({
    connectionString: options.databaseUrl,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: options.connectivityTimeoutMs,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}
