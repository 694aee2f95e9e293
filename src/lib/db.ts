/**
 * Database schema for the configuration store
 * SQLite database client setup
 */

import Database from 'better-sqlite3';

/**
 * Initialize database schema (version 1)
 * Later columns are added by db-migrations.ts
 */
export function initDatabase(db: Database.Database): void {
  // Single-row table holding the scalar settings
  db.exec(`
    CREATE TABLE IF NOT EXISTS reincarnation_config (
      id INTEGER PRIMARY KEY CHECK(id = 1),
      active_cron TEXT,
      active_trigger TEXT,
      cron_time TEXT,
      max_depth TEXT,
      no_change TEXT,
      updated_at INTEGER NOT NULL
    );
  `);

  // Ordered regex rules
  db.exec(`
    CREATE TABLE IF NOT EXISTS regex_rules (
      position INTEGER PRIMARY KEY,
      value TEXT NOT NULL,
      cron_time TEXT NOT NULL DEFAULT ''
    );
  `);
}
