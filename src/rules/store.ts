/**
 * Rule repository
 *
 * Owns the language-bucketed rule set, its persistence under the store
 * directory and the merge/update algorithms. Rules are read-only while a scan
 * runs; every mutation happens between scans.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  COMMON_BUCKET,
  RuleUpdateRecordSchema,
  StoredRuleSchema,
  bucketForLanguage,
  countRules,
  type RuleBuckets,
  type RulePattern,
  type RuleUpdateRecord,
} from '../types/index.js';
import type { RuleSettings } from '../config/schema.js';
import { LAST_UPDATE_FILE_NAME, RULES_FILE_NAME } from '../config/defaults.js';
import { expandHome } from '../config/index.js';
import { type ScanLogger, silentLogger } from '../logging/scan-logger.js';
import type { RuleProvider } from '../scanner/pattern-engine.js';
import { defaultRuleBuckets } from './defaults.js';
import { RuleImporter } from './importer.js';

const SECONDS_PER_DAY = 24 * 3600;

export interface RuleStoreOptions {
  settings: RuleSettings;
  logger?: ScanLogger;
  importer?: RuleImporter;
  /** Used by `update`; defaults to the global fetch at call time */
  fetch?: typeof fetch;
  /** Milliseconds since the epoch */
  clock?: () => number;
}

export interface ImportOutcome {
  success: boolean;
  /** Rules newly added to the store */
  count: number;
}

export interface ParsedBuckets {
  buckets: RuleBuckets;
  dropped: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Validate a rule document record by record. Records that do not validate
 * are counted and left out; a bucket that is not a list is ignored.
 */
export function parseRuleBuckets(data: unknown): ParsedBuckets | null {
  if (!isRecord(data)) return null;
  const buckets: RuleBuckets = {};
  let dropped = 0;

  for (const [language, records] of Object.entries(data)) {
    if (!Array.isArray(records)) {
      dropped += 1;
      continue;
    }
    const rules: RulePattern[] = [];
    for (const record of records) {
      const parsed = StoredRuleSchema.safeParse(record);
      if (parsed.success) rules.push(parsed.data);
      else dropped += 1;
    }
    buckets[language] = rules;
  }
  return { buckets, dropped };
}

/**
 * Write through a temp file and rename it into place
 */
async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;
  await fs.writeFile(tempPath, content, 'utf-8');
  await fs.rename(tempPath, filePath);
}

export class RuleStore implements RuleProvider {
  readonly storeDir: string;
  readonly rulesPath: string;
  readonly lastUpdatePath: string;

  private buckets: RuleBuckets = {};
  private readonly settings: RuleSettings;
  private readonly logger: ScanLogger;
  private readonly importer: RuleImporter;
  private readonly fetchImpl?: typeof fetch;
  private readonly clock: () => number;

  constructor(options: RuleStoreOptions) {
    this.settings = options.settings;
    this.logger = options.logger ?? silentLogger();
    this.fetchImpl = options.fetch;
    this.clock = options.clock ?? Date.now;
    this.importer =
      options.importer ??
      new RuleImporter({
        logger: this.logger,
        fetch: options.fetch,
        cloneRetries: options.settings.clone_retries,
        cloneTimeoutSeconds: options.settings.clone_timeout_seconds,
      });
    this.storeDir = expandHome(options.settings.store_dir);
    this.rulesPath = path.join(this.storeDir, RULES_FILE_NAME);
    this.lastUpdatePath = path.join(this.storeDir, LAST_UPDATE_FILE_NAME);
  }

  /**
   * Create a store, load it and run the auto-update check
   */
  static async open(options: RuleStoreOptions): Promise<RuleStore> {
    const store = new RuleStore(options);
    await store.initialize();
    return store;
  }

  async initialize(): Promise<void> {
    await this.load();
    if (this.settings.auto_update && (await this.shouldUpdate())) {
      await this.logger.info('update', 'auto_update', 'Rule set is stale, updating');
      await this.update();
    }
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /**
   * Load the rule document. A missing document is replaced by the built-in
   * rules; an unreadable one leaves the built-in rules in memory only.
   */
  async load(): Promise<void> {
    let text: string;
    try {
      text = await fs.readFile(this.rulesPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        await this.logger.info('rules', 'bootstrap', 'No rule document found, creating the default rules');
        this.buckets = defaultRuleBuckets();
        await this.save();
        return;
      }
      await this.logger.error('rules', 'load_failed', `Cannot read ${this.rulesPath}: ${errorMessage(error)}`);
      this.buckets = defaultRuleBuckets();
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      await this.logger.error('rules', 'load_failed', `Invalid rule document ${this.rulesPath}: ${errorMessage(error)}`);
      this.buckets = defaultRuleBuckets();
      return;
    }

    const parsed = parseRuleBuckets(data);
    if (!parsed) {
      await this.logger.error('rules', 'load_failed', `Rule document ${this.rulesPath} is not a mapping`);
      this.buckets = defaultRuleBuckets();
      return;
    }
    if (parsed.dropped > 0) {
      await this.logger.warn('rules', 'records_dropped', `Dropped ${parsed.dropped} invalid rule records`);
    }
    this.buckets = parsed.buckets;
    await this.logger.info('rules', 'loaded', `Loaded ${countRules(this.buckets)} rules`);
  }

  /**
   * Persist the rules and stamp the last-update record
   */
  async save(): Promise<boolean> {
    return this.persist(this.buckets);
  }

  private async persist(buckets: RuleBuckets): Promise<boolean> {
    try {
      await fs.mkdir(this.storeDir, { recursive: true });
      await writeFileAtomic(this.rulesPath, JSON.stringify(buckets, null, 2));
      const record: RuleUpdateRecord = { last_update: this.nowSeconds() };
      await writeFileAtomic(this.lastUpdatePath, JSON.stringify(record));
      await this.logger.debug('rules', 'saved', `Saved ${countRules(buckets)} rules`);
      return true;
    } catch (error) {
      await this.logger.error('rules', 'save_failed', `Cannot save rules: ${errorMessage(error)}`);
      return false;
    }
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Common rules followed by the language's own rules
   */
  getPatternsFor(language: string): RulePattern[] {
    const bucket = bucketForLanguage(language);
    const common = this.buckets[COMMON_BUCKET] ?? [];
    if (bucket === COMMON_BUCKET) return [...common];
    return [...common, ...(this.buckets[bucket] ?? [])];
  }

  getBuckets(): RuleBuckets {
    const copy: RuleBuckets = {};
    for (const [bucket, rules] of Object.entries(this.buckets)) copy[bucket] = [...rules];
    return copy;
  }

  listLanguages(): string[] {
    return Object.keys(this.buckets).sort();
  }

  ruleCount(): number {
    return countRules(this.buckets);
  }

  // ---------------------------------------------------------------------------
  // Merge and update
  // ---------------------------------------------------------------------------

  /**
   * Merge incoming rules bucket by bucket and return how many were added.
   *
   * Rules without an id get `<language>-NNNN`. A known id is replaced only
   * when the incoming pattern is non-empty and differs; that is an update,
   * not an addition. Buckets left empty are removed. Nothing is saved.
   */
  merge(incoming: RuleBuckets): number {
    let added = 0;

    for (const [language, rules] of Object.entries(incoming)) {
      const bucketName = bucketForLanguage(language);
      const bucket = (this.buckets[bucketName] ??= []);
      const index = new Map<string, number>();
      bucket.forEach((rule, i) => index.set(rule.id, i));

      for (const incomingRule of rules) {
        const rule: RulePattern = { ...incomingRule };
        if (!rule.id) {
          let n = bucket.length + 1;
          while (index.has(`${bucketName}-${String(n).padStart(4, '0')}`)) n += 1;
          rule.id = `${bucketName}-${String(n).padStart(4, '0')}`;
          if (!rule.name) rule.name = rule.id;
        }

        const existing = index.get(rule.id);
        if (existing !== undefined) {
          if (rule.pattern && rule.pattern !== bucket[existing].pattern) {
            bucket[existing] = rule;
          }
          continue;
        }

        index.set(rule.id, bucket.length);
        bucket.push(rule);
        added += 1;
      }

      if (bucket.length === 0) delete this.buckets[bucketName];
    }

    return added;
  }

  /**
   * True when the last-update record is missing, unreadable or older than
   * the configured interval
   */
  async shouldUpdate(): Promise<boolean> {
    try {
      const text = await fs.readFile(this.lastUpdatePath, 'utf-8');
      const parsed = RuleUpdateRecordSchema.safeParse(JSON.parse(text));
      if (!parsed.success) return true;
      return this.nowSeconds() - parsed.data.last_update > this.settings.update_interval_days * SECONDS_PER_DAY;
    } catch (error) {
      await this.logger.debug('update', 'no_record', `No usable update record: ${errorMessage(error)}`);
      return true;
    }
  }

  /**
   * Replace the whole rule set with the document at the update URL.
   * On any failure the current rules stay as they are.
   */
  async update(): Promise<boolean> {
    const url = this.settings.update_url;
    if (!url) {
      await this.logger.warn('update', 'no_url', 'No rule update URL configured');
      return false;
    }

    let data: unknown;
    try {
      const fetchImpl = this.fetchImpl ?? fetch;
      const response = await fetchImpl(url, { signal: AbortSignal.timeout(30_000) });
      if (response.status !== 200) {
        await this.logger.error('update', 'fetch_failed', `Rule update failed with HTTP ${response.status}`, { url });
        return false;
      }
      data = await response.json();
    } catch (error) {
      await this.logger.error('update', 'fetch_failed', `Rule update failed: ${errorMessage(error)}`, { url });
      return false;
    }

    const parsed = parseRuleBuckets(data);
    if (!parsed) {
      await this.logger.error('update', 'invalid_document', 'Rule update document is not a mapping', { url });
      return false;
    }
    if (parsed.dropped > 0) {
      await this.logger.warn('update', 'records_dropped', `Dropped ${parsed.dropped} invalid rule records`);
    }

    const next = parsed.buckets;
    for (const [bucket, rules] of Object.entries(next)) {
      if (rules.length === 0) delete next[bucket];
    }
    if (!(await this.persist(next))) return false;

    this.buckets = next;
    await this.logger.success('update', 'updated', `Rule set updated: ${this.ruleCount()} rules`);
    return true;
  }

  // ---------------------------------------------------------------------------
  // Imports
  // ---------------------------------------------------------------------------

  private async mergeAndSave(incoming: RuleBuckets, source: string): Promise<ImportOutcome> {
    if (countRules(incoming) === 0) {
      await this.logger.warn('import', 'nothing_imported', `No rules found in ${source}`);
      return { success: false, count: 0 };
    }
    const count = this.merge(incoming);
    const saved = await this.save();
    if (saved) {
      await this.logger.success('import', 'imported', `Imported ${count} new rules from ${source}`);
    }
    return { success: saved, count };
  }

  async importDirectory(dir: string): Promise<ImportOutcome> {
    return this.mergeAndSave(await this.importer.importDirectory(dir), dir);
  }

  async importUrl(url: string): Promise<ImportOutcome> {
    return this.mergeAndSave(await this.importer.importUrl(url), url);
  }

  async importGitRepo(url: string, branch = 'develop', languages?: readonly string[]): Promise<ImportOutcome> {
    const { rules } = await this.importer.importGitRepo(url, branch, languages);
    return this.mergeAndSave(rules, url);
  }

  /**
   * Merge an already-parsed mapping of language to rule records
   */
  async importJson(mapping: unknown): Promise<ImportOutcome> {
    const parsed = parseRuleBuckets(mapping);
    if (!parsed) {
      await this.logger.error('import', 'invalid_document', 'Rule mapping is not an object');
      return { success: false, count: 0 };
    }
    if (parsed.dropped > 0) {
      await this.logger.warn('import', 'records_dropped', `Dropped ${parsed.dropped} invalid rule records`);
    }
    return this.mergeAndSave(parsed.buckets, 'JSON mapping');
  }

  // ---------------------------------------------------------------------------
  // Editing
  // ---------------------------------------------------------------------------

  /**
   * Add a rule to each bucket it declares (common when it declares none)
   * and save. Returns false when nothing new was added.
   */
  async addRule(rule: RulePattern): Promise<boolean> {
    const targets = rule.languages.length > 0 ? rule.languages : [COMMON_BUCKET];
    const incoming: RuleBuckets = {};
    for (const language of targets) incoming[language] = [rule];

    const added = this.merge(incoming);
    if (added === 0) return false;
    return this.save();
  }

  /**
   * Delete one rule; the bucket goes when its last rule does
   */
  async deleteRule(language: string, id: string): Promise<boolean> {
    const bucketName = bucketForLanguage(language);
    const bucket = this.buckets[bucketName];
    const position = bucket?.findIndex((rule) => rule.id === id) ?? -1;
    if (!bucket || position < 0) return false;

    bucket.splice(position, 1);
    if (bucket.length === 0) delete this.buckets[bucketName];
    await this.logger.info('rules', 'deleted', `Deleted rule ${id} from ${bucketName}`);
    return this.save();
  }
}
