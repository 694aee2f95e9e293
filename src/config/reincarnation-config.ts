/**
 * Reincarnation Configuration Constants
 *
 * Validation messages, field names and limits shared by the configuration
 * store, the validators and the CLI.
 */

// =============================================================================
// Validation Messages
// =============================================================================

/**
 * Fixed validation messages.
 * Messages are fixed strings only (no parser error passthrough).
 */
export const VALIDATION_MESSAGES = {
  CRON_NULL: 'Cron time is null.',
  CRON_UNPARSABLE: 'Cron time could not be parsed. Please check for type errors!',
  RULE_CRON_USES_GLOBAL: 'Global cron time will be used for this regular expression.',
  REGEX_EMPTY: 'RegEx is empty.',
  REGEX_UNCOMPILABLE: 'RegEx cannot be compiled!',
  REGEX_UNSAFE: 'RegEx may cause catastrophic backtracking.',
} as const;

// =============================================================================
// Cron
// =============================================================================

/** Maximum cron expression length */
export const MAX_CRON_EXPRESSION_LENGTH = 100;

/**
 * Check the basic shape of a cron expression before it reaches the parser:
 * 5-6 whitespace-separated fields, or a single '@' nickname.
 * Rejects one-shot date strings the parser would otherwise accept.
 */
export function isCronShaped(expression: string): boolean {
  if (expression.length > MAX_CRON_EXPRESSION_LENGTH) {
    return false;
  }

  const parts = expression.trim().split(/\s+/);
  if (parts.length === 1) {
    return parts[0].startsWith('@');
  }
  return parts.length >= 5 && parts.length <= 6;
}

// =============================================================================
// Flags
// =============================================================================

/** The only stored flag value that means "enabled" */
export const ENABLED_FLAG = 'true';

/**
 * Whether a stored flag string means "enabled".
 * Strict equality: 'True', '1', 'yes' and null are all disabled.
 */
export function isFlagEnabled(value: string | null | undefined): boolean {
  return value === ENABLED_FLAG;
}

// =============================================================================
// Retry Depth
// =============================================================================

/** Fallback retry depth for missing or malformed values */
export const DEFAULT_RETRY_DEPTH = 0;

/** Largest accepted retry depth (signed 32-bit integer range) */
export const MAX_RETRY_DEPTH = 2147483647;

/** Accepted retry depth format: optional '+', decimal digits */
export const RETRY_DEPTH_PATTERN = /^\+?\d+$/;

// =============================================================================
// Form Fields
// =============================================================================

/** Scalar fields required in a submitted form */
export const SCALAR_FORM_FIELDS = [
  'activeTrigger',
  'maxDepth',
  'activeCron',
  'cronTime',
  'noChange',
] as const;

export type ScalarFormField = (typeof SCALAR_FORM_FIELDS)[number];

/** Fields with a live validation endpoint */
export const CHECKABLE_FIELDS = ['cronTime', 'regExValue', 'regExCronTime'] as const;

export type CheckableField = (typeof CHECKABLE_FIELDS)[number];

/**
 * Type guard: check whether a value names a checkable field.
 */
export function isCheckableField(value: unknown): value is CheckableField {
  return typeof value === 'string' && (CHECKABLE_FIELDS as readonly string[]).includes(value);
}
