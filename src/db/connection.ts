import { drizzle, NodePgDatabase, NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { sql } from 'drizzle-orm';
import { PgDatabase } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
import { getDatabaseConfig } from '@/config/database.js';
import * as schema from './schema/index.js';

export type Database = NodePgDatabase<typeof schema>;

/** Either the pooled database or a transaction opened on it. */
export type DatabaseExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

let pool: Pool | null = null;
let db: Database | null = null;

export function getDatabase(): Database {
  if (!db) {
    const config = getDatabaseConfig();

    pool = new Pool({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: 15,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });

    db = drizzle(pool, { schema });
  }

  return db;
}

/**
 * Cheap liveness probe used by /health.
 */
export async function checkDatabaseConnection(database: Database = getDatabase()): Promise<boolean> {
  await database.execute(sql`select 1`);
  return true;
}

export async function closeDatabaseConnection(): Promise<void> {
  if (pool) {
    const current = pool;
    pool = null;
    db = null;
    await current.end();
  }
}

export { schema };
