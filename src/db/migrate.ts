import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { sql } from 'drizzle-orm';
import { closeDatabaseConnection, getDatabase } from './connection.js';
import { logger } from '@/config/logger.js';
import { serializeError } from '@/utils/errorHandling.js';

export async function runMigrations(migrationsFolder = './drizzle'): Promise<void> {
  logger.info('Starting database migrations...', { migrationsFolder });
  const db = getDatabase();

  // retrieval_documents.embedding needs pgvector
  await db.execute(sql`CREATE EXTENSION IF NOT EXISTS vector`);
  await migrate(db, { migrationsFolder });

  logger.info('Database migrations completed successfully');
}

if (require.main === module) {
  runMigrations()
    .finally(() => closeDatabaseConnection())
    .catch((error: unknown) => {
      logger.error('Database migration failed', { error: serializeError(error) });
      process.exitCode = 1;
    });
}
