/**
 * Database Migration System
 * Manages schema versioning and migrations for SQLite database
 */

import Database from 'better-sqlite3';
import { initDatabase } from './db';
import { createLogger } from './logger';
import { getErrorMessage } from './errors';

const logger = createLogger('db-migrations');

/**
 * Current schema version
 * Increment this when adding new migrations
 */
export const CURRENT_SCHEMA_VERSION = 2;

/**
 * Migration definition
 */
export interface Migration {
  /** Migration version number (sequential) */
  version: number;

  /** Migration name/description */
  name: string;

  /** Forward migration function */
  up: (db: Database.Database) => void;

  /** Backward migration function (optional, for rollback) */
  down?: (db: Database.Database) => void;
}

/**
 * Migration registry
 * All migrations should be added to this array in order
 */
const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial-schema',
    up: (db) => {
      initDatabase(db);
    },
    down: (db) => {
      db.exec(`DROP TABLE IF EXISTS regex_rules;`);
      db.exec(`DROP TABLE IF EXISTS reincarnation_config;`);
    },
  },
  {
    version: 2,
    name: 'add-regex-rule-description',
    up: (db) => {
      db.exec(`
        ALTER TABLE regex_rules ADD COLUMN description TEXT NOT NULL DEFAULT '';
      `);
    },
    down: (db) => {
      db.exec(`ALTER TABLE regex_rules DROP COLUMN description;`);
    },
  },
];

/**
 * Get current schema version from database
 */
export function getCurrentVersion(db: Database.Database): number {
  try {
    const result = db.prepare(
      'SELECT MAX(version) as version FROM schema_version'
    ).get() as { version: number | null } | undefined;

    return result?.version ?? 0;
  } catch {
    // Table doesn't exist yet
    return 0;
  }
}

/**
 * Initialize schema_version table
 */
function initSchemaVersionTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    );
  `);
}

/**
 * Run all pending migrations
 *
 * @throws Error if migration fails
 */
export function runMigrations(db: Database.Database): void {
  initSchemaVersionTable(db);

  const currentVersion = getCurrentVersion(db);

  const pendingMigrations = migrations.filter(
    migration => migration.version > currentVersion
  );

  if (pendingMigrations.length === 0) {
    logger.debug('migrate:up-to-date', { version: currentVersion });
    return;
  }

  logger.info('migrate:pending', { from: currentVersion, count: pendingMigrations.length });

  // Run each pending migration in a transaction
  for (const migration of pendingMigrations) {
    try {
      db.transaction(() => {
        migration.up(db);

        db.prepare(`
          INSERT INTO schema_version (version, name, applied_at)
          VALUES (?, ?, ?)
        `).run(migration.version, migration.name, Date.now());
      })();

      logger.info('migrate:applied', { version: migration.version, name: migration.name });
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('migrate:failed', { version: migration.version, error: message });
      throw new Error(
        `Migration ${migration.version} (${migration.name}) failed: ${message}`
      );
    }
  }
}

/**
 * Rollback migrations to a specific version
 *
 * @param targetVersion - Version to rollback to
 * @throws Error if rollback is not supported or fails
 */
export function rollbackMigrations(
  db: Database.Database,
  targetVersion: number
): void {
  const currentVersion = getCurrentVersion(db);

  if (targetVersion >= currentVersion) {
    logger.debug('rollback:not-needed', { currentVersion, targetVersion });
    return;
  }

  // Get migrations to rollback (in reverse order)
  const migrationsToRollback = migrations
    .filter(m => m.version > targetVersion && m.version <= currentVersion)
    .sort((a, b) => b.version - a.version);

  for (const migration of migrationsToRollback) {
    const down = migration.down;
    if (!down) {
      throw new Error(
        `Cannot rollback migration ${migration.version} (${migration.name}): ` +
        `no down() function defined`
      );
    }

    try {
      db.transaction(() => {
        down(db);

        db.prepare('DELETE FROM schema_version WHERE version = ?')
          .run(migration.version);
      })();

      logger.info('rollback:applied', { version: migration.version, name: migration.name });
    } catch (error) {
      const message = getErrorMessage(error);
      throw new Error(
        `Rollback of migration ${migration.version} failed: ${message}`
      );
    }
  }
}

/**
 * Get migration history
 */
export function getMigrationHistory(db: Database.Database): Array<{
  version: number;
  name: string;
  applied_at: number;
}> {
  try {
    return db.prepare(`
      SELECT version, name, applied_at
      FROM schema_version
      ORDER BY version ASC
    `).all() as Array<{ version: number; name: string; applied_at: number }>;
  } catch {
    return [];
  }
}
