/**
 * Tests for rule record schemas
 */

import { describe, it, expect } from 'vitest';
import { RuleBucketsSchema, StoredRuleSchema, bucketForLanguage, countRules } from '../../src/types/rules.js';

describe('StoredRuleSchema', () => {
  it('should fill in defaults and take the name from the id', () => {
    const parsed = StoredRuleSchema.parse({ id: 'py-7', pattern: 'yaml\\.load' });
    expect(parsed).toEqual({
      id: 'py-7',
      name: 'py-7',
      pattern: 'yaml\\.load',
      description: '',
      severity: 'medium',
      languages: [],
      source: 'user',
      metadata: {},
    });
  });

  it('should reject a record without a pattern', () => {
    expect(StoredRuleSchema.safeParse({ id: 'x' }).success).toBe(false);
  });

  it('should drop unknown fields', () => {
    const parsed = StoredRuleSchema.parse({ id: 'a', pattern: 'b', owner: 'someone' });
    expect('owner' in parsed).toBe(false);
  });
});

describe('RuleBucketsSchema', () => {
  it('should accept complete rules and reject a bucket holding an incomplete one', () => {
    const parsed = RuleBucketsSchema.parse({ python: [{ id: 'p1', name: 'p1', pattern: 'eval' }] });
    expect(parsed.python?.[0]?.severity).toBe('medium');
    expect(RuleBucketsSchema.safeParse({ python: [{ id: 'p1', pattern: 'eval' }] }).success).toBe(false);
    expect(RuleBucketsSchema.safeParse({ python: 'eval' }).success).toBe(false);
  });
});

describe('bucketForLanguage', () => {
  it('should lower-case and fold aliases', () => {
    expect(bucketForLanguage('Python')).toBe('python');
    expect(bucketForLanguage('JS')).toBe('javascript');
    expect(bucketForLanguage('golang')).toBe('go');
    expect(bucketForLanguage('c++')).toBe('cpp');
    expect(bucketForLanguage('*')).toBe('common');
  });
});

describe('countRules', () => {
  it('should sum all buckets', () => {
    const rule = StoredRuleSchema.parse({ id: 'a', pattern: 'b' });
    expect(countRules({ common: [rule], python: [rule, rule] })).toBe(3);
  });
});
