/**
 * Tests for rule pattern matching
 */

import { describe, it, expect } from 'vitest';
import { PatternMatchEngine } from '../../src/scanner/pattern-engine.js';
import { ScanLogger } from '../../src/logging/scan-logger.js';
import { StaticRules, makeRule } from './helpers.js';

const content = ['import os', '', 'def run(cmd):', '    os.system(cmd)', '    return True', '', 'run("ls")'].join('\n');

describe('PatternMatchEngine', () => {
  it('should locate the first matching line with two lines of context', async () => {
    const engine = new PatternMatchEngine(
      new StaticRules({
        python: [
          makeRule({
            id: 'py-cmd',
            pattern: 'os\\.system',
            severity: 'critical',
            description: 'Command injection',
            metadata: { cwe: ['CWE-78', 'CWE-77'] },
          }),
        ],
      })
    );

    const findings = await engine.match('python', content, 'run.py');

    expect(findings).toEqual([
      {
        severity: 'critical',
        file_path: 'run.py',
        line_number: 4,
        code_snippet: ['', 'def run(cmd):', '    os.system(cmd)', '    return True', ''].join('\n'),
        description: 'Command injection',
        recommendation: 'Review this code',
        cwe_id: 'CWE-78',
        confidence: 'medium',
      },
    ]);
  });

  it('should match case-insensitively and clip the snippet at the file start', async () => {
    const engine = new PatternMatchEngine(
      new StaticRules({ common: [makeRule({ id: 'c1', pattern: 'IMPORT OS', recommendation: 'Avoid' })] })
    );

    const [finding] = await engine.match('python', content, 'run.py');

    expect(finding?.line_number).toBe(1);
    expect(finding?.code_snippet).toBe(['import os', '', 'def run(cmd):'].join('\n'));
    expect(finding?.description).toBe('Potential vulnerability detected');
    expect(finding?.recommendation).toBe('Avoid');
  });

  it('should apply common rules before language rules', async () => {
    const engine = new PatternMatchEngine(
      new StaticRules({
        common: [makeRule({ id: 'c1', pattern: 'return' })],
        python: [makeRule({ id: 'p1', pattern: 'def ' })],
        javascript: [makeRule({ id: 'j1', pattern: 'run' })],
      })
    );

    const findings = await engine.match('python', content, 'run.py');

    expect(findings.map((f) => f.line_number)).toEqual([5, 3]);
  });

  it('should report a match spanning lines without a location', async () => {
    const engine = new PatternMatchEngine(new StaticRules({ common: [makeRule({ id: 'c1', pattern: 'True\\n\\nrun' })] }));

    const [finding] = await engine.match('python', content, 'run.py');

    expect(finding).toBeDefined();
    expect(finding?.line_number).toBeUndefined();
    expect(finding?.code_snippet).toBeUndefined();
  });

  it('should skip empty and invalid patterns and log the invalid one', async () => {
    const logger = new ScanLogger();
    const engine = new PatternMatchEngine(
      new StaticRules({
        common: [makeRule({ id: 'empty', pattern: '' }), makeRule({ id: 'broken', pattern: 'os.system(' })],
      }),
      logger
    );

    expect(await engine.match('python', content, 'run.py')).toEqual([]);
    expect(await engine.match('python', content, 'run.py')).toEqual([]);
    const warnings = logger.getEntries().filter((e) => e.event === 'invalid_pattern');
    expect(warnings).toHaveLength(1);
  });

  it('should log an invalid pattern once when files are matched concurrently', async () => {
    const logger = new ScanLogger();
    const engine = new PatternMatchEngine(
      new StaticRules({
        common: [makeRule({ id: 'empty', pattern: '' }), makeRule({ id: 'broken', pattern: 'os.system(' })],
      }),
      logger
    );

    await Promise.all([
      engine.match('python', content, 'a.py'),
      engine.match('python', content, 'b.py'),
      engine.match('python', content, 'c.py'),
    ]);

    expect(logger.getEntries().filter((e) => e.event === 'invalid_pattern')).toHaveLength(1);
  });

  it('should return the same findings on repeated runs', async () => {
    const engine = new PatternMatchEngine(
      new StaticRules({ python: [makeRule({ id: 'a', pattern: 'os' }), makeRule({ id: 'b', pattern: 'cmd' })] })
    );
    const first = await engine.match('python', content, 'run.py');
    const second = await engine.match('python', content, 'run.py');
    expect(second).toEqual(first);
    expect(first).toHaveLength(2);
  });
});
