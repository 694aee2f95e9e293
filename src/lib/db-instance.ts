/**
 * Database instance singleton
 * Provides a shared database connection for the configuration store
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { getDbPath, resolveDbPath } from './env';
import { runMigrations } from './db-migrations';

let dbInstance: Database.Database | null = null;
let dbInstancePath: string | null = null;

/**
 * Get or create the database instance.
 * Pending migrations are applied when the connection is opened.
 *
 * @param dbPath - Overrides RC_DB_PATH; ignored while a connection is open
 *
 * @example
 * ```typescript
 * const db = getDbInstance();
 * const persistence = new SqliteConfigPersistence(db);
 * ```
 */
export function getDbInstance(dbPath: string = getDbPath()): Database.Database {
  if (!dbInstance) {
    const resolved = resolveDbPath(dbPath);
    if (resolved !== ':memory:') {
      // Ensure the database directory exists
      const dir = path.dirname(resolved);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    const db = new Database(resolved);
    runMigrations(db);
    dbInstance = db;
    dbInstancePath = resolved;
  }

  return dbInstance;
}

/**
 * Resolved path of the open connection (null when none is open)
 */
export function getDbInstancePath(): string | null {
  return dbInstancePath;
}

/**
 * Close the database connection
 * Mainly used for testing cleanup
 */
export function closeDbInstance(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
    dbInstancePath = null;
  }
}
