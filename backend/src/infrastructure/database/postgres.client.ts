/**
 * PostgreSQL connection pool
 * Master data: users, API keys, transactions
 */

import pg from 'pg';
import type { Pool as PoolType } from 'pg';
import type { Config } from '../../config/index.js';
import { createLogger } from '../logging/logger.js';
import { SCHEMA_STATEMENTS } from './schema.js';

const logger = createLogger('postgres-client');

let pool: PoolType | null = null;

export function createPostgresPool(config: Config): PoolType {
  if (pool) {
    return pool;
  }

  pool = new pg.Pool({
    connectionString: config.postgres.url,
    max: config.postgres.maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    ssl: config.env === 'production' ? { rejectUnauthorized: false } : false,
  });

  pool.on('error', (error: Error) => {
    logger.error({ error: error.message }, 'Idle PostgreSQL client error');
  });

  return pool;
}

export async function ensureSchema(target: PoolType): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await target.query(statement);
  }
  logger.info({ statements: SCHEMA_STATEMENTS.length }, 'Schema ensured');
}

export async function closePostgresPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('PostgreSQL closed');
  }
}
