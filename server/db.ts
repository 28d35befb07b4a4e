import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pkg from 'pg';
import type { Pool as PgPool } from 'pg';
import { createLogger } from './lib/logger';

const { Pool } = pkg;
const log = createLogger({ module: 'database' });

/**
 * Database Connection
 *
 * The pool is created once at start-up and handed to the storage layer;
 * nothing in the application imports a shared connection.
 */

export type Database = NodePgDatabase;

export interface DatabaseHandle {
  pool: PgPool;
  db: Database;
  close(): Promise<void>;
}

export interface DatabaseOptions {
  ssl?: boolean;
  maxConnections?: number;
}

export function createDatabase(connectionString: string, options: DatabaseOptions = {}): DatabaseHandle {
  const pool = new Pool({
    connectionString,
    ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
    max: options.maxConnections ?? 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on('error', (err) => {
    log.error({ err }, 'Idle database client error');
  });

  return {
    pool,
    db: drizzle(pool),
    close: () => pool.end(),
  };
}
