/**
 * Configuration Store
 *
 * Holds the restart settings for failed jobs: cron restart and after-build
 * restart toggles, the global cron time, regex rules with per-rule cron
 * overrides, the maximum restart depth and the "no change" option.
 *
 * The configuration is loaded from the injected persistence when the store is
 * created and replaced wholesale on every form submission. Readers get a
 * frozen snapshot; a submission swaps the snapshot only after it was saved.
 *
 * @example
 * ```typescript
 * const store = getConfigurationStore();
 * if (store.isCronRestartEnabled()) {
 *   schedule(store.getCronTime(), store.getMaxRetryDepth());
 * }
 * ```
 */

import { DEFAULT_RETRY_DEPTH, isFlagEnabled } from '../config/reincarnation-config';
import type { ReincarnationConfig, RegexRule, SubmittedForm } from '../types/reincarnation';
import { EMPTY_CONFIG } from '../types/reincarnation';
import { SqliteConfigPersistence, type ConfigPersistence } from './config-repository';
import { parseRetryDepth, sanitizeConfig } from './config-sanitizer';
import {
  validateCronExpression,
  validateRegexOverrideCron,
  validateRegexSyntax,
} from './config-validator';
import { closeDbInstance, getDbInstance } from './db-instance';
import { ErrorCode, wrapError } from './errors';
import { bindSubmission } from './form-binding';
import type { FormValidation } from './form-validation';
import { createLogger, type Logger } from './logger';

/** Result of applying a form submission */
export type SubmissionResult =
  | { success: true }
  | { success: false; error: string };

/**
 * Deep-freeze a configuration so readers cannot mutate the snapshot
 */
function freezeConfig(config: ReincarnationConfig): Readonly<ReincarnationConfig> {
  for (const rule of config.regExprs) {
    Object.freeze(rule);
  }
  Object.freeze(config.regExprs);
  return Object.freeze(config);
}

/**
 * Build the record to persist from a bound form
 */
function toConfig(form: SubmittedForm): ReincarnationConfig {
  return {
    activeCron: form.activeCron,
    activeTrigger: form.activeTrigger,
    cronTime: form.cronTime,
    regExprs: form.regExprs.map((rule) => ({ ...rule })),
    maxDepth: form.maxDepth,
    noChange: form.noChange,
  };
}

export class ConfigurationStore {
  private snapshot: Readonly<ReincarnationConfig> = EMPTY_CONFIG;
  private readonly logger: Logger;

  /**
   * Create the store and load the persisted configuration.
   */
  constructor(private readonly persistence: ConfigPersistence, logger?: Logger) {
    this.logger = logger ?? createLogger('config-store');
    this.load();
  }

  /**
   * (Re)load the configuration from persistence.
   * Unusable stored values are repaired in memory and logged.
   */
  load(): Readonly<ReincarnationConfig> {
    const stored = this.persistence.load();
    if (stored === null) {
      this.logger.debug('load:empty');
    }

    const { config, repairs } = sanitizeConfig(stored ?? EMPTY_CONFIG);
    if (stored !== null) {
      for (const field of repairs) {
        this.logger.warn('load:repaired', { field, stored: stored[field], value: config[field] });
      }
    }

    this.snapshot = freezeConfig(config);
    this.logger.debug('load:complete', { rules: config.regExprs.length });
    return this.snapshot;
  }

  /**
   * Overwrite every field from a submitted form, then persist.
   * Field validation never blocks the save; only an unbindable payload does.
   *
   * @throws AppError (DATABASE_ERROR) when persisting fails
   */
  applySubmission(payload: unknown): SubmissionResult {
    const bound = bindSubmission(payload);
    if (!bound.success) {
      this.logger.warn('submission:rejected', { error: bound.error });
      return { success: false, error: bound.error };
    }

    const submitted = toConfig(bound.form);
    try {
      this.persistence.save(submitted);
    } catch (error) {
      const appError = wrapError(error, ErrorCode.DATABASE_ERROR);
      this.logger.error('submission:save-failed', appError.toLogError());
      throw appError;
    }

    const { config, repairs } = sanitizeConfig(submitted);
    for (const field of repairs) {
      this.logger.warn('submission:repaired', { field, submitted: submitted[field], value: config[field] });
    }
    this.snapshot = freezeConfig(config);
    this.logger.info('submission:applied', { rules: config.regExprs.length });
    return { success: true };
  }

  // ===========================================================================
  // Validation endpoints
  // ===========================================================================

  validateCronExpression(value: string | null | undefined): FormValidation {
    return validateCronExpression(value);
  }

  validateRegexOverrideCron(value: string | null | undefined): FormValidation {
    return validateRegexOverrideCron(value);
  }

  validateRegexSyntax(value: string | null | undefined): FormValidation {
    return validateRegexSyntax(value);
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  /** Current configuration (frozen) */
  getSnapshot(): Readonly<ReincarnationConfig> {
    return this.snapshot;
  }

  isCronRestartEnabled(): boolean {
    return isFlagEnabled(this.snapshot.activeCron);
  }

  isTriggerRestartEnabled(): boolean {
    return isFlagEnabled(this.snapshot.activeTrigger);
  }

  isRestartUnchangedEnabled(): boolean {
    return isFlagEnabled(this.snapshot.noChange);
  }

  /**
   * Maximum number of consecutive after-build restarts.
   * Always a non-negative integer; malformed values were replaced by 0 on entry.
   */
  getMaxRetryDepth(): number {
    return parseRetryDepth(this.snapshot.maxDepth) ?? DEFAULT_RETRY_DEPTH;
  }

  getCronTime(): string | null {
    return this.snapshot.cronTime;
  }

  getRegexRules(): readonly RegexRule[] {
    return this.snapshot.regExprs;
  }

  getActiveCron(): string | null {
    return this.snapshot.activeCron;
  }

  getActiveTrigger(): string | null {
    return this.snapshot.activeTrigger;
  }

  getNoChange(): string | null {
    return this.snapshot.noChange;
  }

  /** Raw (sanitized) retry depth string */
  getMaxDepth(): string | null {
    return this.snapshot.maxDepth;
  }
}

// =============================================================================
// Process-wide instance
// =============================================================================

let storeInstance: ConfigurationStore | null = null;

/**
 * Get or create the configuration store backed by the shared database.
 */
export function getConfigurationStore(): ConfigurationStore {
  if (!storeInstance) {
    storeInstance = new ConfigurationStore(new SqliteConfigPersistence(getDbInstance()));
  }
  return storeInstance;
}

/**
 * Drop the process-wide store and close the shared database connection
 */
export function closeConfigurationStore(): void {
  storeInstance = null;
  closeDbInstance();
}
