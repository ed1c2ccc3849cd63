/**
 * Rules module - repository, import and dialect translation
 */

export { RuleStore, parseRuleBuckets, type RuleStoreOptions, type ImportOutcome, type ParsedBuckets } from './store.js';
export { RuleImporter, REPO_EXCLUDED_DIRS, type RuleImporterOptions, type GitImportResult } from './importer.js';
export {
  convertDialectRule,
  convertRulesDocument,
  extractPrimaryPattern,
  extractRawRules,
  sanitizePattern,
  placeholderPattern,
  normalizeSeverity,
  type RawRule,
  type ConvertResult,
  type DocumentConversion,
} from './dialect.js';
export { cloneRepository, runCommand, type CommandRunner, type CommandResult, type CloneResult } from './git.js';
export { defaultRuleBuckets } from './defaults.js';
