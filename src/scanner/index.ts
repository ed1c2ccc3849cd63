/**
 * Public library entry: scanning core, rule repository and data model
 */

import type { Config } from '../config/schema.js';
import { resolveProfile } from '../config/index.js';
import { createAnalysisAdapter } from '../adapters/index.js';
import type { ScanLogger } from '../logging/scan-logger.js';
import type { RuleProvider } from './pattern-engine.js';
import { ScanOrchestrator } from './orchestrator.js';

export { ScanOrchestrator, NO_FILES_ERROR, CANCELLED_ERROR, type ProgressCallback, type ScanOrchestratorOptions } from './orchestrator.js';
export { FileAnalyzer, type FileReport } from './file-analyzer.js';
export { FileCollector } from './file-collector.js';
export { PathFilter, looksBinary, guessMimeType, type PathFilterOptions } from './path-filter.js';
export { PatternMatchEngine, type RuleProvider } from './pattern-engine.js';
export { buildAnalysisPrompt, parseFindingsResponse, extractJsonArray, type ParseFindingsResult } from './prompt.js';
export { getFileLanguage, countLines, UNKNOWN_LANGUAGE } from './languages.js';
export { runPool, type PoolOptions } from './worker-pool.js';
export { ProjectSummarizer, extractJsonObject, type DirectoryTree, type FileSummaryStats } from './project-summary.js';
export { extractFileInfo, type FileInfo } from './file-info.js';

export * from '../types/index.js';
export * from '../rules/index.js';
export { createAnalysisAdapter, classifyProviderError } from '../adapters/index.js';
export { loadConfig, resolveProfile, type Config, type ProviderProfile } from '../config/index.js';
export { ScanLogger, silentLogger, type LogEntry, type LogLevel, type ScanStage } from '../logging/scan-logger.js';

export interface CreateScannerOptions {
  rules: RuleProvider;
  /** Model profile name; defaults to `scan.profile` */
  profile?: string;
  logger?: ScanLogger;
}

/**
 * Build an orchestrator for a configuration: resolves the model profile once
 * and wires the provider adapter with the configured request timeout
 */
export function createScanOrchestrator(config: Config, options: CreateScannerOptions): ScanOrchestrator {
  const { profile } = resolveProfile(config, options.profile);
  const adapter = createAnalysisAdapter(profile, { timeoutMs: config.scan.timeout_seconds * 1000 });
  return new ScanOrchestrator({
    adapter,
    rules: options.rules,
    settings: config.scan,
    logger: options.logger,
  });
}
