/**
 * Tests for regex-rules.ts
 */

import { describe, it, expect } from 'vitest';
import { findMatchingRule, resolveRuleCronTime } from '@/lib/regex-rules';
import type { RegexRule } from '@/types/reincarnation';

function rule(value: string, cronTime = '', description = ''): RegexRule {
  return { value, description, cronTime };
}

describe('findMatchingRule', () => {
  const rules = [
    rule('OutOfMemoryError', '0 3 * * *', 'heap'),
    rule('Connection (reset|refused)'),
    rule('Error'),
  ];

  it('should return the first matching rule in configured order', () => {
    expect(findMatchingRule(rules, 'worker crashed: OutOfMemoryError: heap space exhausted')).toBe(rules[0]);
  });

  it('should match anywhere in the text', () => {
    expect(findMatchingRule(rules, 'fetch failed: Connection refused by host')).toBe(rules[1]);
  });

  it('should fall through to a later, more general rule', () => {
    expect(findMatchingRule(rules, 'CompilationError in src/main.ts')).toBe(rules[2]);
  });

  it('should return undefined when nothing matches', () => {
    expect(findMatchingRule(rules, 'BUILD SUCCESSFUL')).toBeUndefined();
  });

  it('should skip blank and uncompilable rules', () => {
    const withBroken = [rule(''), rule('[broken'), rule('broken')];

    expect(findMatchingRule(withBroken, '[broken pipe')).toBe(withBroken[2]);
  });

  it('should return undefined for an empty rule list', () => {
    expect(findMatchingRule([], 'anything')).toBeUndefined();
  });
});

describe('resolveRuleCronTime', () => {
  it('should prefer the rule override', () => {
    expect(resolveRuleCronTime(rule('x', '0 3 * * *'), '0 1 * * *')).toBe('0 3 * * *');
  });

  it('should use the global cron time for an empty override', () => {
    expect(resolveRuleCronTime(rule('x', ''), '0 1 * * *')).toBe('0 1 * * *');
  });

  it('should use the global cron time for a blank override', () => {
    expect(resolveRuleCronTime(rule('x', '   '), '0 1 * * *')).toBe('0 1 * * *');
  });

  it('should return null when neither is set', () => {
    expect(resolveRuleCronTime(rule('x', ''), null)).toBeNull();
  });
});
