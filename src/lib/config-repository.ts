/**
 * Configuration persistence
 *
 * The store only sees ConfigPersistence; the host decides where the record
 * lives. SqliteConfigPersistence is the default implementation.
 */

import Database from 'better-sqlite3';
import type { ReincarnationConfig, RegexRule } from '../types/reincarnation';

/**
 * Opaque load/save of the whole configuration record
 */
export interface ConfigPersistence {
  /** Load the persisted record (null when nothing was saved yet) */
  load(): ReincarnationConfig | null;
  /** Replace the persisted record */
  save(config: ReincarnationConfig): void;
}

/**
 * reincarnation_config row from database
 */
interface ConfigRow {
  active_cron: string | null;
  active_trigger: string | null;
  cron_time: string | null;
  max_depth: string | null;
  no_change: string | null;
}

/**
 * regex_rules row from database
 */
interface RegexRuleRow {
  value: string;
  description: string;
  cron_time: string;
}

/**
 * Map database row to RegexRule
 */
function mapRegexRuleRow(row: RegexRuleRow): RegexRule {
  return {
    value: row.value,
    description: row.description,
    cronTime: row.cron_time,
  };
}

/**
 * SQLite-backed persistence (better-sqlite3).
 * Expects the schema from runMigrations().
 */
export class SqliteConfigPersistence implements ConfigPersistence {
  constructor(private readonly db: Database.Database) {}

  load(): ReincarnationConfig | null {
    const row = this.db.prepare(`
      SELECT active_cron, active_trigger, cron_time, max_depth, no_change
      FROM reincarnation_config
      WHERE id = 1
    `).get() as ConfigRow | undefined;

    if (!row) {
      return null;
    }

    const rules = this.db.prepare(`
      SELECT value, description, cron_time
      FROM regex_rules
      ORDER BY position ASC
    `).all() as RegexRuleRow[];

    return {
      activeCron: row.active_cron,
      activeTrigger: row.active_trigger,
      cronTime: row.cron_time,
      regExprs: rules.map(mapRegexRuleRow),
      maxDepth: row.max_depth,
      noChange: row.no_change,
    };
  }

  save(config: ReincarnationConfig): void {
    const upsertConfig = this.db.prepare(`
      INSERT INTO reincarnation_config (
        id, active_cron, active_trigger, cron_time, max_depth, no_change, updated_at
      )
      VALUES (1, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        active_cron = excluded.active_cron,
        active_trigger = excluded.active_trigger,
        cron_time = excluded.cron_time,
        max_depth = excluded.max_depth,
        no_change = excluded.no_change,
        updated_at = excluded.updated_at
    `);
    const deleteRules = this.db.prepare('DELETE FROM regex_rules');
    const insertRule = this.db.prepare(`
      INSERT INTO regex_rules (position, value, description, cron_time)
      VALUES (?, ?, ?, ?)
    `);

    this.db.transaction(() => {
      upsertConfig.run(
        config.activeCron,
        config.activeTrigger,
        config.cronTime,
        config.maxDepth,
        config.noChange,
        Date.now()
      );
      deleteRules.run();
      config.regExprs.forEach((rule, position) => {
        insertRule.run(position, rule.value, rule.description, rule.cronTime);
      });
    })();
  }
}
