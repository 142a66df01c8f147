/**
 * Storage entry point: picks the backend for a resolved `DatabaseConfig`.
 *
 * Callers depend on `DatabaseAdapter` only. Which store sits behind it is
 * decided once, from `DATABASE_URL`, by `resolveDatabaseConfig()`.
 */

import type { DatabaseConfig } from './config.js';
import type { DatabaseAdapter } from './db-backend.js';
import { SqliteDatabaseAdapter } from './db-sqlite.js';
import { createPostgresAdapter } from './db-postgres.js';
import { createSupabaseAdapter } from './db-supabase.js';

export function createDatabaseAdapter(dbConfig: DatabaseConfig): DatabaseAdapter {
  switch (dbConfig.kind) {
    case 'sqlite':
      return new SqliteDatabaseAdapter(dbConfig.messagesDbPath, dbConfig.authDbPath);
    case 'supabase':
      return createSupabaseAdapter({ url: dbConfig.url, key: dbConfig.key });
    case 'postgres':
      return createPostgresAdapter(dbConfig.connectionString);
  }
}

export type { DatabaseAdapter, UnitOfWork } from './db-backend.js';
export { withUnitOfWork } from './unit-of-work.js';
