/**
 * Tests for dialect rule translation
 */

import { describe, it, expect } from 'vitest';
import {
  convertDialectRule,
  convertRulesDocument,
  extractPrimaryPattern,
  extractRawRules,
  normalizeSeverity,
  placeholderPattern,
  sanitizePattern,
} from '../../src/rules/dialect.js';

describe('sanitizePattern', () => {
  it('should drop metavariables and turn ellipses into wildcards', () => {
    expect(sanitizePattern('$DB.query(...)')).toBe('\\.query\\(.*?\\)');
  });

  it('should fold newlines into spaces and escape the rest', () => {
    expect(sanitizePattern('foo(\n    $ARG)')).toBe('foo\\( \\)');
    expect(sanitizePattern('a+b')).toBe('a\\+b');
  });
});

describe('extractPrimaryPattern', () => {
  it('should read a plain or nested pattern', () => {
    expect(extractPrimaryPattern({ pattern: 'eval(...)' })).toEqual(['eval(...)']);
    expect(extractPrimaryPattern({ pattern: { pattern: 'exec(...)' } })).toEqual(['exec(...)']);
  });

  it('should keep every pattern-either alternative', () => {
    expect(extractPrimaryPattern({ 'pattern-either': [{ pattern: 'foo' }, 'bar', { other: 1 }] })).toEqual([
      'foo',
      'bar',
    ]);
  });

  it('should fall through regex, inside and not forms', () => {
    expect(extractPrimaryPattern({ 'pattern-regex': 'md5\\(' })).toEqual(['md5\\(']);
    expect(extractPrimaryPattern({ 'pattern-inside': 'def $F(...)' })).toEqual(['def $F(...)']);
    expect(extractPrimaryPattern({ 'pattern-not': 'safe()' })).toEqual(['(?!safe())']);
  });

  it('should search patterns lists one level deep', () => {
    expect(
      extractPrimaryPattern({ patterns: [{ 'pattern-inside': 'x' }, { patterns: [{ pattern: 'inner()' }] }] })
    ).toEqual(['inner()']);
  });

  it('should return undefined when nothing matches', () => {
    expect(extractPrimaryPattern({ id: 'x', message: 'no pattern' })).toBeUndefined();
  });
});

describe('normalizeSeverity', () => {
  it('should map dialect levels and keep known severities', () => {
    expect(normalizeSeverity('ERROR')).toBe('high');
    expect(normalizeSeverity('WARNING')).toBe('medium');
    expect(normalizeSeverity('INFO')).toBe('low');
    expect(normalizeSeverity('Critical')).toBe('critical');
    expect(normalizeSeverity('bogus')).toBe('medium');
    expect(normalizeSeverity(3)).toBe('medium');
  });
});

describe('placeholderPattern', () => {
  it('should prefer CWE, then OWASP, then the id', () => {
    expect(placeholderPattern({ metadata: { cwe: ['79', '80'] } }, 'r')).toBe('# CWE-79, 80');
    expect(placeholderPattern({ metadata: { owasp: 'A03' } }, 'r')).toBe('# OWASP-A03');
    expect(placeholderPattern({}, 'r')).toBe('# r');
  });
});

describe('convertDialectRule', () => {
  it('should translate a pattern-either rule into a regex alternation', () => {
    const result = convertDialectRule({
      id: 'danger-call',
      message: 'Dangerous call',
      severity: 'ERROR',
      languages: ['python'],
      'pattern-either': [{ pattern: 'foo' }, { pattern: 'bar' }],
      metadata: { cwe: 'CWE-94' },
    });

    expect(result).toEqual({
      success: true,
      rule: {
        id: 'danger-call',
        name: 'Dangerous call',
        pattern: 'foo|bar',
        description: 'Dangerous call',
        severity: 'high',
        languages: ['python'],
        source: 'semgrep',
        metadata: { cwe: 'CWE-94' },
      },
    });
    if (result.success) {
      const regex = new RegExp(result.rule.pattern, 'i');
      expect(regex.test('x = BAR()')).toBe(true);
      expect(regex.test('baz()')).toBe(false);
    }
  });

  it('should use a placeholder pattern when only the id is usable', () => {
    const result = convertDialectRule({ id: 'meta-only', metadata: { cwe: '200' } });
    expect(result.success && result.rule.pattern).toBe('# CWE-200');
    expect(result.success && result.rule.name).toBe('meta-only');
  });

  it('should fail without an id, a pattern or CWE/OWASP metadata', () => {
    expect(convertDialectRule({ message: 'orphan', metadata: { category: 'security' } })).toEqual({
      success: false,
      reason: 'rule has neither an id, a pattern nor CWE/OWASP metadata',
    });
  });

  it('should keep an id-less rule on its CWE metadata with an empty id', () => {
    const result = convertDialectRule({ message: 'weak hash', metadata: { cwe: 'CWE-327' }, languages: ['python'] });

    expect(result).toEqual({
      success: true,
      rule: {
        id: '',
        name: 'weak hash',
        pattern: '# CWE-CWE-327',
        description: 'weak hash',
        severity: 'medium',
        languages: ['python'],
        source: 'semgrep',
        metadata: { cwe: 'CWE-327' },
      },
    });
  });

  it('should fold language aliases and duplicates', () => {
    const result = convertDialectRule({ id: 'r', pattern: 'x', languages: ['JS', 'javascript', 'golang'] });
    expect(result.success && result.rule.languages).toEqual(['javascript', 'go']);
  });

  it('should convert numeric ids and cut long messages for the name', () => {
    const message = 'A'.repeat(60);
    const result = convertDialectRule({ id: 42, pattern: 'x', message });
    expect(result.success && result.rule.id).toBe('42');
    expect(result.success && result.rule.name).toBe('A'.repeat(50));
  });
});

describe('extractRawRules', () => {
  it('should read each document shape', () => {
    expect(extractRawRules({ rules: [{ id: 'a' }, 'junk', { id: 'b' }] })).toEqual([{ id: 'a' }, { id: 'b' }]);
    expect(extractRawRules({ id: 'one', pattern: 'x' })).toEqual([{ id: 'one', pattern: 'x' }]);
    expect(extractRawRules([{ id: 'c' }])).toEqual([{ id: 'c' }]);
    expect(
      extractRawRules({ groupA: { rules: [{ id: 'd' }] }, groupB: { pattern: 'y' }, note: 'text' })
    ).toEqual([{ id: 'd' }, { pattern: 'y' }]);
    expect(extractRawRules('nothing')).toEqual([]);
  });

  it('should accept inline rules under any pattern key', () => {
    const either = { id: 'r1', languages: ['python'], 'pattern-either': ['foo', 'bar'] };
    expect(extractRawRules(either)).toEqual([either]);
    expect(extractRawRules({ id: 'r2', 'pattern-regex': 'md5\\(' })).toEqual([{ id: 'r2', 'pattern-regex': 'md5\\(' }]);
    expect(extractRawRules({ named: { id: 'r3', patterns: [{ pattern: 'x' }] } })).toEqual([
      { id: 'r3', patterns: [{ pattern: 'x' }] },
    ]);
    expect(extractRawRules({ id: 'r4', message: 'no pattern key' })).toEqual([]);
  });
});

describe('convertRulesDocument', () => {
  it('should bucket rules by language and report dropped ones', () => {
    const { buckets, dropped } = convertRulesDocument({
      rules: [
        { id: 'py-1', pattern: 'pickle.loads(...)', languages: ['python'] },
        { id: 'multi', pattern: 'eval(...)', languages: ['javascript', 'python'] },
        { id: 'any', pattern: 'TODO' },
        { message: 'no id, no pattern' },
        { message: 'weak hash', metadata: { owasp: 'A02' }, languages: ['python'] },
      ],
    });

    expect(Object.keys(buckets).sort()).toEqual(['common', 'javascript', 'python']);
    expect(buckets.python?.map((r) => r.id)).toEqual(['py-1', 'multi', '']);
    expect(buckets.python?.[2]?.pattern).toBe('# OWASP-A02');
    expect(buckets.javascript?.map((r) => r.id)).toEqual(['multi']);
    expect(buckets.common?.map((r) => r.pattern)).toEqual(['TODO']);
    expect(buckets.python?.[0]?.pattern).toBe('pickle\\.loads\\(.*?\\)');
    expect(dropped).toEqual(['rule has neither an id, a pattern nor CWE/OWASP metadata']);
  });
});
