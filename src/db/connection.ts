import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import type { Env } from '../config/env.js';
import type { Logger } from '../lib/logger.js';
import * as schema from './schema/index.js';

const { Pool } = pg;

export type Database = ReturnType<typeof drizzle<typeof schema>>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

/**
 * Open the pg pool and wrap it in drizzle. The handle is owned by the app context;
 * nothing else keeps a reference to the pool.
 */
export function createDatabase(
  env: Pick<Env, 'DATABASE_URL' | 'DATABASE_POOL_SIZE'>,
  logger: Logger,
): DatabaseHandle {
  const pool = new Pool({
    connectionString: env.DATABASE_URL,
    max: env.DATABASE_POOL_SIZE,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database pool error');
  });

  const db = drizzle(pool, { schema, logger: false });
  logger.info({ poolSize: env.DATABASE_POOL_SIZE }, 'Database connection pool created');

  let closed = false;
  return {
    db,
    async close() {
      if (closed) return;
      closed = true;
      await pool.end();
      logger.info('Database connection pool closed');
    },
  };
}
