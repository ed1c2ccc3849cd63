/**
 * Scan orchestration
 *
 * Drives collection, bounded-concurrency analysis and aggregation. Every
 * failure ends up in `stats.error` or a diagnostic finding; the public
 * methods never reject.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { AnalysisAdapter, Finding, ScanResult, ScanStats } from '../types/index.js';
import type { ScanSettings } from '../config/schema.js';
import { type ScanLogger, silentLogger } from '../logging/scan-logger.js';
import { FileAnalyzer, type FileReport } from './file-analyzer.js';
import { FileCollector } from './file-collector.js';
import { PathFilter } from './path-filter.js';
import { PatternMatchEngine, type RuleProvider } from './pattern-engine.js';
import { ProjectSummarizer } from './project-summary.js';
import { extractFileInfo } from './file-info.js';
import { UNKNOWN_LANGUAGE } from './languages.js';
import { runPool } from './worker-pool.js';

/**
 * Progress callback; percent never decreases within one scan
 */
export type ProgressCallback = (message: string, percent: number) => void;

export interface ScanOrchestratorOptions {
  adapter: AnalysisAdapter;
  /** Read-only for the duration of a scan */
  rules: RuleProvider;
  settings: ScanSettings;
  logger?: ScanLogger;
  /** Milliseconds since the epoch */
  clock?: () => number;
}

export const NO_FILES_ERROR = 'no scannable files found';
export const CANCELLED_ERROR = 'scan cancelled';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Collects per-file reports into result findings and directory statistics
 */
class ScanAccumulator {
  readonly findings: Finding[] = [];
  private totalLines = 0;
  private readonly languages: Record<string, number> = {};
  private readonly extensions: Record<string, number> = {};

  add(report: FileReport): void {
    this.findings.push(...report.findings);
    this.totalLines += report.lines;
    increment(this.languages, report.language);
    increment(this.extensions, report.extension);
  }

  stats(totalFiles: number): ScanStats {
    return {
      total_files: totalFiles,
      total_lines_of_code: this.totalLines,
      languages: { ...this.languages },
      file_extensions: { ...this.extensions },
    };
  }

  primaryLanguage(): string | undefined {
    let best: string | undefined;
    for (const [language, count] of Object.entries(this.languages)) {
      if (best === undefined || count > this.languages[best]) best = language;
    }
    return best;
  }
}

export class ScanOrchestrator {
  private readonly analyzer: FileAnalyzer;
  private readonly collector: FileCollector;
  private readonly filter: PathFilter;
  private readonly summarizer: ProjectSummarizer;
  private readonly settings: ScanSettings;
  private readonly logger: ScanLogger;
  private readonly clock: () => number;
  private cancelled = false;

  constructor(options: ScanOrchestratorOptions) {
    this.settings = options.settings;
    this.logger = options.logger ?? silentLogger();
    this.clock = options.clock ?? Date.now;
    this.filter = PathFilter.fromSettings(options.settings);
    this.collector = new FileCollector(this.filter, this.logger);
    const engine = new PatternMatchEngine(options.rules, this.logger);
    this.analyzer = new FileAnalyzer(options.adapter, engine, this.logger);
    this.summarizer = new ProjectSummarizer({ adapter: options.adapter, filter: this.filter, logger: this.logger });
  }

  /**
   * Ask the running scan to stop. Files already being analyzed finish; no
   * further files start and no further progress is reported.
   */
  cancel(): void {
    this.cancelled = true;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }

  /**
   * Scan every eligible file under a directory
   */
  async scanDirectory(
    dirPath: string,
    concurrency: number = this.settings.max_workers,
    onProgress?: ProgressCallback
  ): Promise<ScanResult> {
    this.cancelled = false;
    const timestamp = this.nowSeconds();
    const base = {
      scan_id: `dir_${timestamp}`,
      scan_path: dirPath,
      scan_type: 'directory' as const,
      timestamp,
    };

    let lastPercent = 0;
    const report = (message: string, percent: number): void => {
      if (this.cancelled || !onProgress) return;
      lastPercent = Math.max(lastPercent, percent);
      onProgress(message, lastPercent);
    };

    try {
      const stats = await fs.stat(dirPath).catch(() => undefined);
      if (!stats?.isDirectory()) {
        const error = `directory not found: ${dirPath}`;
        await this.logger.error('collect', 'missing_directory', error);
        report(`Scan failed: ${error}`, 100);
        return { ...base, findings: [], stats: { error }, project_info: {} };
      }

      report('Collecting files', 5);
      const files = await this.collector.collect(dirPath);
      await this.logger.info('collect', 'files_collected', `Found ${files.length} files to scan`, {
        path: dirPath,
        count: files.length,
      });

      if (files.length === 0) {
        report('No scannable files found', 100);
        return { ...base, findings: [], stats: { error: NO_FILES_ERROR }, project_info: {} };
      }
      report(`Found ${files.length} files to scan`, 10);

      const accumulator = new ScanAccumulator();
      const total = files.length;
      let completed = 0;

      await runPool(
        files,
        async (file) => {
          try {
            accumulator.add(await this.analyzer.inspectFile(file));
          } finally {
            completed += 1;
            report(
              `Scanning (${completed}/${total}): ${path.basename(file)}`,
              10 + Math.floor((70 * completed) / total)
            );
          }
        },
        {
          concurrency,
          shouldStop: () => this.cancelled,
          onError: async (error, file) => {
            await this.logger.error('analyze', 'file_failed', `Skipping ${file}: ${errorMessage(error)}`);
          },
        }
      );

      report('Aggregating statistics', 85);
      const scanStats = accumulator.stats(total);
      await this.logger.info('aggregate', 'stats', `Aggregated ${accumulator.findings.length} findings`, {
        ...scanStats,
      });

      report('Summarizing project', 90);
      const primaryLanguage = accumulator.primaryLanguage() ?? UNKNOWN_LANGUAGE;
      let projectInfo: Record<string, unknown> = {
        project_name: path.basename(path.resolve(dirPath)),
        primary_language: primaryLanguage,
      };

      if (this.cancelled) {
        await this.logger.warn('aggregate', 'cancelled', `Scan of ${dirPath} cancelled`, { completed, total });
        return {
          ...base,
          findings: accumulator.findings,
          stats: { ...scanStats, error: CANCELLED_ERROR },
          project_info: projectInfo,
        };
      }

      if (this.settings.summarize_project) {
        projectInfo = {
          ...projectInfo,
          ...(await this.summarizer.summarizeDirectory(dirPath, scanStats, primaryLanguage)),
        };
      }

      report('Scan complete, generating report', 95);
      await this.logger.success('aggregate', 'scan_complete', `Scanned ${total} files under ${dirPath}`);
      return { ...base, findings: accumulator.findings, stats: scanStats, project_info: projectInfo };
    } catch (error) {
      const message = errorMessage(error);
      await this.logger.error('aggregate', 'scan_failed', `Scan of ${dirPath} failed: ${message}`);
      report(`Scan failed: ${message}`, 100);
      return { ...base, findings: [], stats: { error: message }, project_info: {} };
    }
  }

  /**
   * Scan a single file. An excluded file gives an empty result.
   */
  async scanFile(filePath: string): Promise<ScanResult> {
    const timestamp = this.nowSeconds();
    const base = {
      scan_id: `file_${timestamp}`,
      scan_path: filePath,
      scan_type: 'file' as const,
      timestamp,
    };

    try {
      const stats = await fs.stat(filePath).catch(() => undefined);
      if (!stats?.isFile()) {
        const error = `file not found: ${filePath}`;
        await this.logger.error('collect', 'missing_file', error);
        return { ...base, findings: [], stats: { error }, project_info: {} };
      }

      if (await this.filter.shouldExclude(filePath)) {
        await this.logger.info('collect', 'file_excluded', `Skipping excluded file ${filePath}`);
        return { ...base, findings: [], stats: {}, project_info: {} };
      }

      const fileReport = await this.analyzer.inspectFile(filePath);
      const fileStats = {
        lines_of_code: fileReport.lines,
        language: fileReport.language,
        file_size_bytes: fileReport.sizeBytes,
      };
      const summary = this.settings.summarize_project
        ? await this.summarizer.summarizeFile(filePath, fileReport.content, fileStats)
        : {};
      return {
        ...base,
        findings: fileReport.findings,
        stats: fileStats,
        project_info: { ...summary, file_info: extractFileInfo(filePath, fileReport.content) },
      };
    } catch (error) {
      const message = errorMessage(error);
      await this.logger.error('analyze', 'file_failed', `Scan of ${filePath} failed: ${message}`);
      return { ...base, findings: [], stats: { error: message }, project_info: {} };
    }
  }

  /**
   * Scan the files a merge changed. The caller supplies the changed paths,
   * relative to `basePath`; paths that no longer exist are counted in
   * `total_files` but neither analyzed nor measured, and so are excluded ones.
   */
  async scanChangedFiles(
    basePath: string,
    relativePaths: readonly string[],
    scanId: string,
    concurrency: number = this.settings.max_workers
  ): Promise<ScanResult> {
    this.cancelled = false;
    const accumulator = new ScanAccumulator();

    const existing: string[] = [];
    for (const relative of relativePaths) {
      const full = path.join(basePath, relative);
      const stats = await fs.stat(full).catch(() => undefined);
      if (!stats?.isFile()) continue;
      existing.push(full);
    }

    await runPool(
      existing,
      async (full) => {
        if (await this.filter.shouldExclude(full)) {
          await this.logger.debug('collect', 'file_excluded', `Skipping excluded file ${full}`);
          return;
        }
        accumulator.add(await this.analyzer.inspectFile(full));
      },
      {
        concurrency,
        shouldStop: () => this.cancelled,
        onError: async (error, full) => {
          await this.logger.error('analyze', 'file_failed', `Skipping ${full}: ${errorMessage(error)}`);
        },
      }
    );

    await this.logger.info('aggregate', 'merge_scanned', `Scanned ${existing.length} changed files`, {
      listed: relativePaths.length,
      scanned: existing.length,
    });

    return {
      scan_id: scanId,
      scan_path: basePath,
      scan_type: 'git-merge',
      timestamp: this.nowSeconds(),
      findings: accumulator.findings,
      stats: accumulator.stats(relativePaths.length),
      project_info: { merge_info: { diff_files: [...relativePaths] } },
    };
  }
}
