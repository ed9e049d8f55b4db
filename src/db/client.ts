/**
 * Drizzle ORM Database Client
 *
 * Connections are created explicitly by the composition root and closed
 * through the returned handle.
 */

import { drizzle, PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { loggers } from '@/lib/logger';
import * as schema from './schema';

const log = loggers.db.child({ service: 'DatabaseClient' });

// =============================================================================
// Types
// =============================================================================

export type VectorDatabase = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  db: VectorDatabase;
  close(): Promise<void>;
}

// =============================================================================
// Client Factory
// =============================================================================

/**
 * Open a pooled connection to the vector database.
 *
 * @param connectionString - PostgreSQL connection string (pgvector required)
 */
export function createDatabase(connectionString: string): DatabaseConnection {
  const client = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(client, { schema });
  log.debug('Created database connection');

  return {
    db,
    async close() {
      await client.end();
      log.info('Database connection closed');
    },
  };
}
