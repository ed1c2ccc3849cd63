/**
 * Per-file analysis pipeline: provider findings followed by rule findings
 */

import { promises as fs } from 'node:fs';
import type { AnalysisAdapter, AnalysisResult, Finding } from '../types/index.js';
import { classifyProviderError } from '../adapters/errors.js';
import { type ScanLogger, silentLogger } from '../logging/scan-logger.js';
import { countLines, fileExtension, getFileLanguage } from './languages.js';
import type { PatternMatchEngine } from './pattern-engine.js';
import {
  buildAnalysisPrompt,
  parseFailureFinding,
  parseFindingsResponse,
  providerFailureFinding,
} from './prompt.js';

/**
 * Everything learned about one file during a scan
 */
export interface FileReport {
  filePath: string;
  language: string;
  extension: string;
  lines: number;
  sizeBytes: number;
  /** Decoded text the findings were computed from */
  content: string;
  findings: Finding[];
}

export class FileAnalyzer {
  constructor(
    private readonly adapter: AnalysisAdapter,
    private readonly engine: PatternMatchEngine,
    private readonly logger: ScanLogger = silentLogger()
  ) {}

  /**
   * Analyze one file and return its findings.
   *
   * @throws when the file cannot be read
   */
  async analyzeFile(filePath: string): Promise<Finding[]> {
    const report = await this.inspectFile(filePath);
    return report.findings;
  }

  /**
   * Read a file (invalid UTF-8 is replaced, never rejected) and analyze it.
   *
   * @throws when the file cannot be read
   */
  async inspectFile(filePath: string): Promise<FileReport> {
    const buffer = await fs.readFile(filePath);
    const content = buffer.toString('utf8');
    const language = getFileLanguage(filePath);

    return {
      filePath,
      language,
      extension: fileExtension(filePath),
      lines: countLines(content),
      sizeBytes: buffer.length,
      content,
      findings: await this.analyzeContent(filePath, content, language),
    };
  }

  /**
   * Analyze content already in memory.
   *
   * A provider failure yields a single diagnostic finding; otherwise the
   * parsed provider findings (or a parse diagnostic) come first and the rule
   * findings follow. The two sources are not deduplicated.
   */
  async analyzeContent(
    filePath: string,
    content: string,
    language: string = getFileLanguage(filePath)
  ): Promise<Finding[]> {
    await this.logger.debug('analyze', 'file_start', `Analyzing ${filePath} with ${this.adapter.label}`);

    const prompt = buildAnalysisPrompt(filePath, language, content);
    let result: AnalysisResult;
    try {
      result = await this.adapter.analyze(prompt);
    } catch (error) {
      result = { success: false, error: classifyProviderError(error) };
    }

    if (!result.success) {
      await this.logger.error('analyze', 'provider_failed', `Analysis failed for ${filePath}`, {
        kind: result.error.kind,
        message: result.error.message,
        status: result.error.status,
      });
      return [providerFailureFinding(filePath, result.error)];
    }

    const findings: Finding[] = [];
    const parsed = parseFindingsResponse(result.response, filePath);
    if (parsed.success) {
      findings.push(...parsed.findings);
    } else {
      await this.logger.warn('analyze', 'parse_failed', `Could not parse model response for ${filePath}`, {
        reason: parsed.reason,
      });
      findings.push(parseFailureFinding(filePath));
    }

    findings.push(...(await this.engine.match(language, content, filePath)));
    return findings;
  }
}
