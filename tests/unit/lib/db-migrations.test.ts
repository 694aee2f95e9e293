/**
 * Tests for db-migrations.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import {
  CURRENT_SCHEMA_VERSION,
  getCurrentVersion,
  getMigrationHistory,
  rollbackMigrations,
  runMigrations,
} from '@/lib/db-migrations';

function columnNames(db: Database.Database, table: string): string[] {
  const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  return columns.map((column) => column.name);
}

function tableExists(db: Database.Database, table: string): boolean {
  const row = db.prepare(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
  ).get(table);
  return row !== undefined;
}

describe('db-migrations', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  describe('getCurrentVersion', () => {
    it('should return 0 for a fresh database', () => {
      expect(getCurrentVersion(db)).toBe(0);
    });
  });

  describe('runMigrations', () => {
    it('should migrate to the current schema version', () => {
      runMigrations(db);

      expect(CURRENT_SCHEMA_VERSION).toBe(2);
      expect(getCurrentVersion(db)).toBe(CURRENT_SCHEMA_VERSION);
    });

    it('should create the configuration tables', () => {
      runMigrations(db);

      expect(columnNames(db, 'reincarnation_config')).toEqual([
        'id',
        'active_cron',
        'active_trigger',
        'cron_time',
        'max_depth',
        'no_change',
        'updated_at',
      ]);
      expect(columnNames(db, 'regex_rules')).toEqual(['position', 'value', 'cron_time', 'description']);
    });

    it('should be idempotent', () => {
      runMigrations(db);
      runMigrations(db);

      expect(getMigrationHistory(db)).toHaveLength(2);
    });

    it('should only allow a single configuration row', () => {
      runMigrations(db);

      expect(() => db.prepare(
        'INSERT INTO reincarnation_config (id, updated_at) VALUES (2, 0)'
      ).run()).toThrow();
    });
  });

  describe('getMigrationHistory', () => {
    it('should list applied migrations in order', () => {
      runMigrations(db);

      expect(getMigrationHistory(db).map(({ version, name }) => ({ version, name }))).toEqual([
        { version: 1, name: 'initial-schema' },
        { version: 2, name: 'add-regex-rule-description' },
      ]);
    });

    it('should return an empty list before migrating', () => {
      expect(getMigrationHistory(db)).toEqual([]);
    });
  });

  describe('rollbackMigrations', () => {
    it('should drop the rule description column when rolling back to version 1', () => {
      runMigrations(db);

      rollbackMigrations(db, 1);

      expect(getCurrentVersion(db)).toBe(1);
      expect(columnNames(db, 'regex_rules')).toEqual(['position', 'value', 'cron_time']);
    });

    it('should drop every table when rolling back to version 0', () => {
      runMigrations(db);

      rollbackMigrations(db, 0);

      expect(getCurrentVersion(db)).toBe(0);
      expect(tableExists(db, 'reincarnation_config')).toBe(false);
      expect(tableExists(db, 'regex_rules')).toBe(false);
    });

    it('should do nothing when the target is not below the current version', () => {
      runMigrations(db);

      rollbackMigrations(db, CURRENT_SCHEMA_VERSION);

      expect(getCurrentVersion(db)).toBe(CURRENT_SCHEMA_VERSION);
    });

    it('should migrate forward again after a rollback', () => {
      runMigrations(db);
      rollbackMigrations(db, 1);

      runMigrations(db);

      expect(columnNames(db, 'regex_rules')).toContain('description');
    });
  });
});
