/**
 * Tests for form-binding.ts
 */

import { describe, it, expect } from 'vitest';
import { bindSubmission } from '@/lib/form-binding';

function createPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    activeTrigger: 'true',
    maxDepth: '3',
    activeCron: 'false',
    cronTime: '0 1 * * *',
    regExprs: [],
    noChange: 'false',
    ...overrides,
  };
}

describe('bindSubmission', () => {
  it('should bind a complete payload', () => {
    const result = bindSubmission(createPayload({
      regExprs: [{ value: 'Connection reset', description: 'flaky network', cronTime: '0 4 * * *' }],
    }));

    expect(result).toEqual({
      success: true,
      form: {
        activeTrigger: 'true',
        maxDepth: '3',
        activeCron: 'false',
        cronTime: '0 1 * * *',
        regExprs: [{ value: 'Connection reset', description: 'flaky network', cronTime: '0 4 * * *' }],
        noChange: 'false',
      },
    });
  });

  it('should trim every scalar field', () => {
    const result = bindSubmission(createPayload({
      activeTrigger: ' true ',
      maxDepth: ' 5\n',
      activeCron: '\ttrue',
      cronTime: '  0 1 * * *  ',
      noChange: 'false  ',
    }));

    expect(result.success && result.form).toMatchObject({
      activeTrigger: 'true',
      maxDepth: '5',
      activeCron: 'true',
      cronTime: '0 1 * * *',
      noChange: 'false',
    });
  });

  it('should convert checkbox booleans and numbers to strings', () => {
    const result = bindSubmission(createPayload({ activeCron: true, noChange: false, maxDepth: 4 }));

    expect(result.success && result.form).toMatchObject({
      activeCron: 'true',
      noChange: 'false',
      maxDepth: '4',
    });
  });

  it('should keep flag spellings other than "true" as submitted', () => {
    const result = bindSubmission(createPayload({ activeTrigger: 'True' }));

    expect(result.success && result.form.activeTrigger).toBe('True');
  });

  it('should accept a single rule object as a one-element list', () => {
    const result = bindSubmission(createPayload({ regExprs: { value: 'timeout' } }));

    expect(result.success && result.form.regExprs).toEqual([
      { value: 'timeout', description: '', cronTime: '' },
    ]);
  });

  it('should treat missing or null rules as an empty list', () => {
    const payload = createPayload();
    delete payload.regExprs;

    expect(bindSubmission(payload)).toMatchObject({ success: true, form: { regExprs: [] } });
    expect(bindSubmission(createPayload({ regExprs: null }))).toMatchObject({
      success: true,
      form: { regExprs: [] },
    });
  });

  it('should default and trim rule fields', () => {
    const result = bindSubmission(createPayload({
      regExprs: [
        { value: ' disk full ', description: null },
        { value: 'killed', cronTime: ' 0 6 * * * ' },
      ],
    }));

    expect(result.success && result.form.regExprs).toEqual([
      { value: 'disk full', description: '', cronTime: '' },
      { value: 'killed', description: '', cronTime: '0 6 * * *' },
    ]);
  });

  it('should preserve rule order', () => {
    const result = bindSubmission(createPayload({
      regExprs: [{ value: 'c' }, { value: 'a' }, { value: 'b' }],
    }));

    expect(result.success && result.form.regExprs.map((r) => r.value)).toEqual(['c', 'a', 'b']);
  });

  describe('rejections', () => {
    it('should reject a non-object payload', () => {
      expect(bindSubmission(null)).toEqual({ success: false, error: 'Form payload must be an object' });
      expect(bindSubmission([])).toEqual({ success: false, error: 'Form payload must be an object' });
      expect(bindSubmission('activeCron=true')).toEqual({
        success: false,
        error: 'Form payload must be an object',
      });
    });

    it('should reject a missing scalar field', () => {
      const payload = createPayload();
      delete payload.cronTime;

      expect(bindSubmission(payload)).toEqual({ success: false, error: 'Missing field: cronTime' });
    });

    it('should reject a scalar field holding an object', () => {
      expect(bindSubmission(createPayload({ maxDepth: { value: 3 } }))).toEqual({
        success: false,
        error: 'Field maxDepth must be a string, boolean or number',
      });
    });

    it('should reject a null scalar field', () => {
      expect(bindSubmission(createPayload({ noChange: null }))).toEqual({
        success: false,
        error: 'Field noChange must be a string, boolean or number',
      });
    });

    it('should reject a rule without a string value', () => {
      expect(bindSubmission(createPayload({ regExprs: [{ value: 'ok' }, { description: 'x' }] }))).toEqual({
        success: false,
        error: 'regExprs[1].value must be a string',
      });
    });

    it('should reject a rule that is not an object', () => {
      expect(bindSubmission(createPayload({ regExprs: ['timeout'] }))).toEqual({
        success: false,
        error: 'regExprs[0] must be an object',
      });
    });

    it('should reject a non-string rule cron time', () => {
      expect(bindSubmission(createPayload({ regExprs: [{ value: 'x', cronTime: 5 }] }))).toEqual({
        success: false,
        error: 'regExprs[0].cronTime must be a string',
      });
    });
  });
});
