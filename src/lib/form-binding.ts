/**
 * Form Binding
 *
 * Turns an untyped configuration form payload into a SubmittedForm.
 * Scalar values are trimmed; checkbox values posted as booleans or numbers
 * are converted to their string form ('true' / 'false').
 */

import { SCALAR_FORM_FIELDS, type ScalarFormField } from '../config/reincarnation-config';
import type { RegexRule, SubmittedForm } from '../types/reincarnation';

/** Result of binding a submitted payload */
export type BindResult =
  | { success: true; form: SubmittedForm }
  | { success: false; error: string };

/**
 * Narrow a value to a plain (non-array) object
 */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a scalar payload value to a trimmed string.
 *
 * @returns The string, or null when the value is not a scalar
 */
function toScalarString(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'boolean') {
    return String(value);
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/**
 * Bind one regex rule. Missing description and cron override default to ''.
 */
function bindRule(value: unknown, index: number): RegexRule | string {
  if (!isRecord(value)) {
    return `regExprs[${index}] must be an object`;
  }
  if (typeof value.value !== 'string') {
    return `regExprs[${index}].value must be a string`;
  }

  const rule: RegexRule = { value: value.value.trim(), description: '', cronTime: '' };
  for (const key of ['description', 'cronTime'] as const) {
    const raw = value[key];
    if (raw === undefined || raw === null) {
      continue;
    }
    if (typeof raw !== 'string') {
      return `regExprs[${index}].${key} must be a string`;
    }
    rule[key] = raw.trim();
  }
  return rule;
}

/**
 * Bind the rule list. A single rule object is accepted as a one-element list.
 */
function bindRules(value: unknown): RegexRule[] | string {
  if (value === undefined || value === null) {
    return [];
  }
  const items = Array.isArray(value) ? value : [value];
  const rules: RegexRule[] = [];
  for (let i = 0; i < items.length; i++) {
    const bound = bindRule(items[i], i);
    if (typeof bound === 'string') {
      return bound;
    }
    rules.push(bound);
  }
  return rules;
}

/**
 * Bind a submitted configuration payload.
 *
 * @param payload - Parsed form payload (e.g. JSON body)
 * @returns The bound form, or a fixed error message naming the field
 */
export function bindSubmission(payload: unknown): BindResult {
  if (!isRecord(payload)) {
    return { success: false, error: 'Form payload must be an object' };
  }

  const scalars: Partial<Record<ScalarFormField, string>> = {};
  for (const field of SCALAR_FORM_FIELDS) {
    if (!(field in payload)) {
      return { success: false, error: `Missing field: ${field}` };
    }
    const value = toScalarString(payload[field]);
    if (value === null) {
      return { success: false, error: `Field ${field} must be a string, boolean or number` };
    }
    scalars[field] = value;
  }

  const rules = bindRules(payload.regExprs);
  if (typeof rules === 'string') {
    return { success: false, error: rules };
  }

  return {
    success: true,
    form: {
      activeTrigger: scalars.activeTrigger ?? '',
      maxDepth: scalars.maxDepth ?? '',
      activeCron: scalars.activeCron ?? '',
      cronTime: scalars.cronTime ?? '',
      regExprs: rules,
      noChange: scalars.noChange ?? '',
    },
  };
}
