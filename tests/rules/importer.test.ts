/**
 * Tests for rule import from directories, URLs and repositories
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { RuleImporter } from '../../src/rules/importer.js';
import type { CommandRunner } from '../../src/rules/git.js';
import { ScanLogger } from '../../src/logging/scan-logger.js';
import { buildZip } from './zip-fixture.js';

const PYTHON_RULES = `rules:
  - id: py-pickle
    message: Unsafe deserialization
    severity: ERROR
    languages: [python]
    pattern: pickle.loads(...)
`;

const MIXED_RULES = `rules:
  - id: js-eval
    severity: WARNING
    languages: [javascript]
    pattern-either:
      - pattern: eval(...)
      - pattern: new Function(...)
  - id: any-secret
    pattern-regex: AKIA[0-9A-Z]{16}
`;

function respond(body: string | Uint8Array, status = 200): typeof fetch {
  return async () => new Response(body, { status });
}

const ids = (rules: Array<{ id: string }> | undefined) => (rules ?? []).map((rule) => rule.id);

describe('RuleImporter', () => {
  let testDir: string;

  const createFile = async (relativePath: string, content: string): Promise<void> => {
    const fullPath = path.join(testDir, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content);
  };

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sourcescan-import-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  // ---------------------------------------------------------------------------
  // convertText
  // ---------------------------------------------------------------------------

  describe('convertText', () => {
    it('should read every document of a multi-document file', async () => {
      const buckets = await new RuleImporter().convertText(`${PYTHON_RULES}---\n${MIXED_RULES}`, 'inline');

      expect(ids(buckets.python)).toEqual(['py-pickle']);
      expect(ids(buckets.javascript)).toEqual(['js-eval']);
      expect(ids(buckets.common)).toEqual(['any-secret']);
      expect(buckets.python?.[0]?.severity).toBe('high');
      expect(buckets.javascript?.[0]?.pattern).toBe('eval\\(.*?\\)|new Function\\(.*?\\)');
    });

    it('should skip invalid documents and log them', async () => {
      const logger = new ScanLogger();
      const buckets = await new RuleImporter({ logger }).convertText('rules: [unclosed\n', 'broken.yaml');

      expect(buckets).toEqual({});
      expect(logger.getEntries().map((e) => e.event)).toEqual(['yaml_invalid']);
    });

    it('should translate a single inline pattern-either rule', async () => {
      const buckets = await new RuleImporter().convertText(
        'id: r1\nmessage: x\nlanguages: [python]\npattern-either:\n  - foo\n  - bar\n',
        'inline.yaml'
      );

      expect(Object.keys(buckets)).toEqual(['python']);
      expect(buckets.python?.map((r) => [r.id, r.pattern])).toEqual([['r1', 'foo|bar']]);
    });

    it('should log a document without recognisable rules', async () => {
      const logger = new ScanLogger();
      const buckets = await new RuleImporter({ logger }).convertText('title: notes\nowner: team\n', 'notes.yaml');

      expect(buckets).toEqual({});
      expect(logger.getEntries().map((e) => e.event)).toEqual(['no_rules']);
    });
  });

  // ---------------------------------------------------------------------------
  // importDirectory
  // ---------------------------------------------------------------------------

  describe('importDirectory', () => {
    it('should translate yaml files recursively and drop empty buckets', async () => {
      await createFile('rules/python/pickle.yaml', PYTHON_RULES);
      await createFile('rules/web/mixed.yml', MIXED_RULES);
      await createFile('rules/README.txt', 'not rules');

      const buckets = await new RuleImporter().importDirectory(path.join(testDir, 'rules'));

      expect(Object.keys(buckets).sort()).toEqual(['common', 'javascript', 'python']);
      expect(ids(buckets.python)).toEqual(['py-pickle']);
    });

    it('should turn a pattern-either rule into one rule matching both alternatives', async () => {
      await createFile(
        'either/choice.yaml',
        'rules:\n  - id: foo-or-bar\n    message: Either call\n    pattern-either: ["foo", "bar"]\n'
      );

      const buckets = await new RuleImporter().importDirectory(path.join(testDir, 'either'));

      expect(Object.keys(buckets)).toEqual(['common']);
      expect(buckets.common).toHaveLength(1);
      expect(buckets.common?.[0]?.pattern).toBe('foo|bar');
    });

    it('should return nothing for a missing directory', async () => {
      const logger = new ScanLogger();
      const buckets = await new RuleImporter({ logger }).importDirectory(path.join(testDir, 'missing'));

      expect(buckets).toEqual({});
      expect(logger.getErrors()[0]?.event).toBe('dir_unreadable');
    });
  });

  // ---------------------------------------------------------------------------
  // importUrl
  // ---------------------------------------------------------------------------

  describe('importUrl', () => {
    it('should translate a downloaded yaml document', async () => {
      const importer = new RuleImporter({ fetch: respond(PYTHON_RULES) });
      const buckets = await importer.importUrl('https://rules.test/python.yaml');
      expect(ids(buckets.python)).toEqual(['py-pickle']);
    });

    it('should translate the yaml entries of a zip archive', async () => {
      const archive = buildZip([
        { name: 'pack/python.yaml', content: PYTHON_RULES },
        { name: 'pack/mixed.yml', content: MIXED_RULES, method: 'deflate' },
        { name: 'pack/LICENSE', content: 'MIT' },
      ]);
      const importer = new RuleImporter({ fetch: respond(new Uint8Array(archive)) });

      const buckets = await importer.importUrl('https://rules.test/download?id=7');

      expect(Object.keys(buckets).sort()).toEqual(['common', 'javascript', 'python']);
    });

    it('should return nothing for a non-200 response', async () => {
      const importer = new RuleImporter({ fetch: respond('missing', 404) });
      expect(await importer.importUrl('https://rules.test/python.yaml')).toEqual({});
    });

    it('should return nothing when the request fails', async () => {
      const logger = new ScanLogger();
      const failing: typeof fetch = async () => {
        throw new TypeError('fetch failed');
      };
      const importer = new RuleImporter({ fetch: failing, logger });

      expect(await importer.importUrl('https://rules.test/python.yaml')).toEqual({});
      expect(logger.getErrors()[0]?.message).toBe('Rule download failed: fetch failed');
    });
  });

  // ---------------------------------------------------------------------------
  // importGitRepo
  // ---------------------------------------------------------------------------

  describe('importGitRepo', () => {
    const fakeClone =
      (files: Record<string, string>): CommandRunner =>
      async (_command, args) => {
        const target = args[args.length - 1] ?? '';
        for (const [relative, content] of Object.entries(files)) {
          const full = path.join(target, relative);
          await fs.mkdir(path.dirname(full), { recursive: true });
          await fs.writeFile(full, content);
        }
        return { code: 0, stdout: '', stderr: '', timedOut: false };
      };

    const repoFiles = {
      'python/pickle.yaml': PYTHON_RULES,
      'javascript/mixed.yaml': MIXED_RULES,
      'tests/fixture.yaml': PYTHON_RULES,
      'README.md': '# rules',
    };

    it('should read every top-level rule directory and remove the clone', async () => {
      const scratch = path.join(testDir, 'scratch');
      await fs.mkdir(scratch);
      const importer = new RuleImporter({ runner: fakeClone(repoFiles), tmpDir: scratch });

      const result = await importer.importGitRepo('https://git.test/rules.git');

      expect(result.count).toBe(3);
      expect(ids(result.rules.python)).toEqual(['py-pickle']);
      expect(ids(result.rules.javascript)).toEqual(['js-eval']);
      expect(ids(result.rules.common)).toEqual(['any-secret']);
      expect(await fs.readdir(scratch)).toEqual([]);
    });

    it('should read only the requested language directories', async () => {
      const logger = new ScanLogger();
      const importer = new RuleImporter({ runner: fakeClone(repoFiles), tmpDir: testDir, logger });

      const result = await importer.importGitRepo('https://git.test/rules.git', 'main', ['Python', 'ruby']);

      expect(result.count).toBe(1);
      expect(Object.keys(result.rules)).toEqual(['python']);
      expect(logger.getEntries().some((e) => e.event === 'dir_missing')).toBe(true);
    });

    it('should return nothing when the clone fails', async () => {
      const failing: CommandRunner = async () => ({ code: 128, stdout: '', stderr: 'fatal', timedOut: false });
      const importer = new RuleImporter({
        runner: failing,
        cloneRetries: 2,
        sleep: async () => undefined,
        tmpDir: testDir,
      });

      expect(await importer.importGitRepo('https://git.test/rules.git')).toEqual({ rules: {}, count: 0 });
    });
  });
});
