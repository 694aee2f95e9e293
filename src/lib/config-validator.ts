/**
 * Configuration Field Validators
 *
 * Live per-field checks for the configuration form. Every check returns a
 * FormValidation; parser exceptions are converted, never rethrown.
 *
 * Security measures for regular expressions:
 * - RegExp constructor for syntax validation
 * - safe-regex2 for catastrophic backtracking detection (checkRegexSafety,
 *   advisory only and separate from the syntax check)
 */

import { Cron } from 'croner';
import safeRegex from 'safe-regex2';
import {
  VALIDATION_MESSAGES,
  isCronShaped,
  isFlagEnabled,
  type CheckableField,
} from '../config/reincarnation-config';
import { ok, warning, error, type FormValidation } from './form-validation';
import type { SubmittedForm } from '../types/reincarnation';

// =============================================================================
// Types
// =============================================================================

/** Validation result for one field of a submitted form */
export interface FieldValidation {
  field: CheckableField;
  /** 0-based rule index, set for regex rule fields */
  index?: number;
  result: FormValidation;
}

// =============================================================================
// Cron
// =============================================================================

/**
 * Check whether croner can parse a cron expression.
 * The job is created paused and without a callback, so no timer is started.
 */
function canParseCron(expression: string): boolean {
  try {
    new Cron(expression, { paused: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate a cron expression.
 *
 * @param value - Cron expression (null/undefined when the field was absent)
 */
export function validateCronExpression(value: string | null | undefined): FormValidation {
  if (value === null || value === undefined || value.trim() === '') {
    return error(VALIDATION_MESSAGES.CRON_NULL);
  }
  const expression = value.trim();
  if (!isCronShaped(expression) || !canParseCron(expression)) {
    return error(VALIDATION_MESSAGES.CRON_UNPARSABLE);
  }
  return ok();
}

/**
 * Validate the cron override of a regex rule.
 * The empty string selects the global cron time and is only a warning.
 */
export function validateRegexOverrideCron(value: string | null | undefined): FormValidation {
  if (value === '') {
    return warning(VALIDATION_MESSAGES.RULE_CRON_USES_GLOBAL);
  }
  return validateCronExpression(value);
}

// =============================================================================
// Regular Expressions
// =============================================================================

/**
 * Validate regular expression syntax.
 */
export function validateRegexSyntax(value: string | null | undefined): FormValidation {
  if (value === null || value === undefined || value.trim() === '') {
    return warning(VALIDATION_MESSAGES.REGEX_EMPTY);
  }

  try {
    new RegExp(value);
  } catch {
    return error(VALIDATION_MESSAGES.REGEX_UNCOMPILABLE);
  }
  return ok();
}

/**
 * Flag a compilable expression that risks catastrophic backtracking.
 * Blank and uncompilable values are left to validateRegexSyntax.
 */
export function checkRegexSafety(value: string | null | undefined): FormValidation {
  if (value === null || value === undefined || validateRegexSyntax(value).kind !== 'ok') {
    return ok();
  }
  return safeRegex(value) ? ok() : warning(VALIDATION_MESSAGES.REGEX_UNSAFE);
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Run the validation endpoint for a field.
 *
 * @param field - Field name as used by the configuration form
 * @param value - Current field value
 */
export function checkField(field: CheckableField, value: string | null | undefined): FormValidation {
  switch (field) {
    case 'cronTime':
      return validateCronExpression(value);
    case 'regExValue':
      return validateRegexSyntax(value);
    case 'regExCronTime':
      return validateRegexOverrideCron(value);
  }
}

/**
 * Run every field check over a bound form.
 * The global cron time is only checked while cron restart is enabled.
 * A rule value flagged by checkRegexSafety gets a second regExValue entry.
 */
export function validateSubmission(form: SubmittedForm): FieldValidation[] {
  const results: FieldValidation[] = [];

  if (isFlagEnabled(form.activeCron)) {
    results.push({ field: 'cronTime', result: validateCronExpression(form.cronTime) });
  }

  form.regExprs.forEach((rule, index) => {
    results.push({ field: 'regExValue', index, result: validateRegexSyntax(rule.value) });
    const safety = checkRegexSafety(rule.value);
    if (safety.kind !== 'ok') {
      results.push({ field: 'regExValue', index, result: safety });
    }
    results.push({ field: 'regExCronTime', index, result: validateRegexOverrideCron(rule.cronTime) });
  });

  return results;
}

/**
 * Whether any validation is at error level
 */
export function hasErrors(validations: FieldValidation[]): boolean {
  return validations.some((v) => v.result.kind === 'error');
}
