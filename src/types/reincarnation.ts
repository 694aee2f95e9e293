/**
 * Reincarnation configuration type definitions
 */

/**
 * A regular expression matched against build failure text,
 * with an optional cron schedule that overrides the global one
 */
export interface RegexRule {
  /** Regular expression source */
  value: string;
  /** Free-text label for the administrator */
  description: string;
  /** Per-rule cron override ('' = use the global cron time) */
  cronTime: string;
}

/**
 * Persisted configuration record.
 *
 * Flags and the retry depth keep their string encoding so that records
 * written by older installations load unchanged.
 */
export interface ReincarnationConfig {
  /** Cron restart of failed jobs ('true' = enabled) */
  activeCron: string | null;
  /** After-build restart of failed jobs ('true' = enabled) */
  activeTrigger: string | null;
  /** Global cron time */
  cronTime: string | null;
  /** Ordered regex rules */
  regExprs: RegexRule[];
  /** Maximum consecutive after-build restarts, as a decimal string */
  maxDepth: string | null;
  /** Restart jobs whose last two builds have no change between them ('true' = enabled) */
  noChange: string | null;
}

/**
 * Submitted form after binding. Scalar fields are always present.
 */
export interface SubmittedForm {
  activeTrigger: string;
  maxDepth: string;
  activeCron: string;
  cronTime: string;
  regExprs: RegexRule[];
  noChange: string;
}

/** Configuration with every field unset */
export const EMPTY_CONFIG: Readonly<ReincarnationConfig> = Object.freeze({
  activeCron: null,
  activeTrigger: null,
  cronTime: null,
  regExprs: [],
  maxDepth: null,
  noChange: null,
});
