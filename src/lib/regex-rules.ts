/**
 * Regex rule lookup
 *
 * Resolves which rule applies to a build failure text and which cron
 * schedule governs restarts for it.
 */

import type { RegexRule } from '../types/reincarnation';

/**
 * Compile a rule's expression.
 *
 * @returns The RegExp, or null for blank or uncompilable expressions
 */
function compileRule(rule: RegexRule): RegExp | null {
  if (rule.value.trim() === '') {
    return null;
  }
  try {
    return new RegExp(rule.value);
  } catch {
    return null;
  }
}

/**
 * Find the first rule, in configured order, whose expression matches the text.
 * Blank and uncompilable rules never match.
 *
 * @param rules - Configured rules
 * @param text - Failure text (e.g. a build log excerpt)
 */
export function findMatchingRule(
  rules: readonly RegexRule[],
  text: string
): RegexRule | undefined {
  return rules.find((rule) => compileRule(rule)?.test(text) ?? false);
}

/**
 * Cron time that governs a rule: its own override, or the global cron time
 * when the override is empty.
 */
export function resolveRuleCronTime(
  rule: RegexRule,
  globalCronTime: string | null
): string | null {
  const override = rule.cronTime.trim();
  return override !== '' ? override : globalCronTime;
}
