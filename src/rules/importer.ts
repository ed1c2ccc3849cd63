/**
 * Rule import from directories, URLs and git repositories
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseAllDocuments } from 'yaml';
import { STANDARD_BUCKETS, countRules, type RuleBuckets } from '../types/index.js';
import { type ScanLogger, silentLogger } from '../logging/scan-logger.js';
import { appendBuckets, convertRulesDocument } from './dialect.js';
import { cloneRepository, type CommandRunner } from './git.js';
import { isZipBuffer, readZipFiles, type ZipLimits } from './zip.js';

/** Top-level repository directories never holding rules */
export const REPO_EXCLUDED_DIRS: readonly string[] = ['.git', '.github', 'tests', 'docs', '__pycache__'];

const YAML_FILE = /\.ya?ml$/i;

export interface RuleImporterOptions {
  logger?: ScanLogger;
  /** Defaults to the global fetch at call time */
  fetch?: typeof fetch;
  requestTimeoutMs?: number;
  cloneRetries?: number;
  cloneTimeoutSeconds?: number;
  runner?: CommandRunner;
  sleep?: (ms: number) => Promise<void>;
  /** Parent directory for scratch clones */
  tmpDir?: string;
  zipLimits?: ZipLimits;
}

export interface GitImportResult {
  rules: RuleBuckets;
  count: number;
}

function dropEmptyBuckets(buckets: RuleBuckets): RuleBuckets {
  for (const [bucket, rules] of Object.entries(buckets)) {
    if (rules.length === 0) delete buckets[bucket];
  }
  return buckets;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RuleImporter {
  private readonly logger: ScanLogger;
  private readonly options: RuleImporterOptions;

  constructor(options: RuleImporterOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Translate a YAML text, document by document. Unparseable documents and
   * rules that cannot be converted are logged and skipped.
   */
  async convertText(text: string, source: string): Promise<RuleBuckets> {
    const buckets: RuleBuckets = {};

    for (const document of parseAllDocuments(text)) {
      if (document.errors.length > 0) {
        await this.logger.warn('import', 'yaml_invalid', `Skipping invalid YAML document in ${source}`, {
          error: document.errors[0].message,
        });
        continue;
      }
      const content: unknown = document.toJS();
      if (content === null || content === undefined) continue;

      const { buckets: converted, found, dropped } = convertRulesDocument(content);
      if (found === 0) {
        await this.logger.warn('import', 'no_rules', `No rules recognised in a document of ${source}`);
      }
      for (const reason of dropped) {
        await this.logger.warn('import', 'rule_dropped', `Dropped a rule in ${source}: ${reason}`);
      }
      appendBuckets(buckets, converted);
    }

    return buckets;
  }

  /**
   * Translate every .yaml/.yml file under a directory, recursively
   */
  async importDirectory(dir: string): Promise<RuleBuckets> {
    const buckets: RuleBuckets = {};
    for (const bucket of STANDARD_BUCKETS) buckets[bucket] = [];

    let files: string[];
    try {
      files = await this.findYamlFiles(dir);
    } catch (error) {
      await this.logger.error('import', 'dir_unreadable', `Cannot read rule directory ${dir}: ${errorMessage(error)}`);
      return {};
    }
    await this.logger.info('import', 'yaml_found', `Found ${files.length} YAML files in ${dir}`);

    for (const file of files) {
      let text: string;
      try {
        text = await fs.readFile(file, 'utf8');
      } catch (error) {
        await this.logger.warn('import', 'file_unreadable', `Skipping ${file}: ${errorMessage(error)}`);
        continue;
      }
      appendBuckets(buckets, await this.convertText(text, file));
    }

    dropEmptyBuckets(buckets);
    await this.logger.info('import', 'converted', `Converted ${countRules(buckets)} rules from ${dir}`);
    return buckets;
  }

  private async findYamlFiles(root: string): Promise<string[]> {
    const found: string[] = [];
    const recurse = async (dir: string): Promise<void> => {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      for (const entry of entries) {
        const abs = path.join(dir, entry.name);
        if (entry.isDirectory()) await recurse(abs);
        else if (entry.isFile() && YAML_FILE.test(entry.name)) found.push(abs);
      }
    };
    await recurse(root);
    return found;
  }

  /**
   * Fetch a YAML document or a ZIP archive of them.
   * Any failure gives an empty mapping.
   */
  async importUrl(url: string): Promise<RuleBuckets> {
    const fetchImpl = this.options.fetch ?? fetch;
    try {
      const response = await fetchImpl(url, {
        signal: AbortSignal.timeout(this.options.requestTimeoutMs ?? 30_000),
      });
      if (response.status !== 200) {
        await this.logger.error('import', 'fetch_failed', `Rule download failed with HTTP ${response.status}`, { url });
        return {};
      }

      const body = Buffer.from(await response.arrayBuffer());
      let buckets: RuleBuckets;
      if (new URL(url).pathname.toLowerCase().endsWith('.zip') || isZipBuffer(body)) {
        buckets = {};
        const files = readZipFiles(body, (name) => YAML_FILE.test(name), this.options.zipLimits);
        for (const file of files) {
          appendBuckets(buckets, await this.convertText(file.data.toString('utf8'), file.name));
        }
      } else {
        buckets = await this.convertText(body.toString('utf8'), url);
      }

      dropEmptyBuckets(buckets);
      await this.logger.info('import', 'converted', `Converted ${countRules(buckets)} rules from ${url}`);
      return buckets;
    } catch (error) {
      await this.logger.error('import', 'fetch_failed', `Rule download failed: ${errorMessage(error)}`, { url });
      return {};
    }
  }

  /**
   * Shallow-clone a repository and translate its rules. With `languages`,
   * only those top-level directories are read; otherwise every top-level
   * directory outside REPO_EXCLUDED_DIRS. The clone is always removed.
   */
  async importGitRepo(url: string, branch = 'develop', languages?: readonly string[]): Promise<GitImportResult> {
    const scratch = await fs.mkdtemp(path.join(this.options.tmpDir ?? os.tmpdir(), 'sourcescan-rules-'));
    const repoDir = path.join(scratch, 'repo');

    try {
      const cloned = await cloneRepository(url, branch, repoDir, {
        retries: this.options.cloneRetries ?? 3,
        timeoutSeconds: this.options.cloneTimeoutSeconds ?? 60,
        runner: this.options.runner,
        sleep: this.options.sleep,
        logger: this.logger,
      });
      if (!cloned.success) return { rules: {}, count: 0 };

      const rules: RuleBuckets = {};
      const dirs = languages && languages.length > 0
        ? languages.map((language) => language.toLowerCase())
        : await this.listRuleDirs(repoDir);

      for (const dir of dirs) {
        const abs = path.join(repoDir, dir);
        const stats = await fs.stat(abs).catch(() => undefined);
        if (!stats?.isDirectory()) {
          await this.logger.warn('import', 'dir_missing', `No rule directory ${dir} in ${url}`);
          continue;
        }
        appendBuckets(rules, await this.importDirectory(abs));
      }

      const count = countRules(rules);
      if (count === 0) {
        await this.logger.warn('import', 'no_rules', `No usable rules found in ${url}`);
      }
      return { rules, count };
    } catch (error) {
      await this.logger.error('import', 'git_import_failed', `Importing ${url} failed: ${errorMessage(error)}`);
      return { rules: {}, count: 0 };
    } finally {
      await fs.rm(scratch, { recursive: true, force: true });
    }
  }

  private async listRuleDirs(repoDir: string): Promise<string[]> {
    const entries = await fs.readdir(repoDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && !REPO_EXCLUDED_DIRS.includes(entry.name))
      .map((entry) => entry.name)
      .sort();
  }
}
