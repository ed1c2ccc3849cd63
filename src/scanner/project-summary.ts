/**
 * Project-level summaries asked of the analysis provider after a scan.
 *
 * A summary never fails a scan: a provider failure leaves only the stats,
 * and an unparseable answer keeps the raw text with placeholder fields.
 */

import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { AnalysisAdapter, AnalysisResult, ScanStats } from '../types/index.js';
import { classifyProviderError } from '../adapters/errors.js';
import { type ScanLogger, silentLogger } from '../logging/scan-logger.js';
import type { PathFilter } from './path-filter.js';

export const STRUCTURE_DEPTH = 3;
export const FILE_EXCERPT_CHARS = 3000;
export const NOT_PROVIDED = 'not provided';
export const NOT_ANALYZED = 'not analyzed';

export interface FileNode {
  type: 'file';
  size: number;
}

/** Directory listing; a subtree cut off by the depth limit is `{ '...': '...' }` */
export interface DirectoryTree {
  [name: string]: DirectoryTree | FileNode | string;
}

export interface FileSummaryStats {
  lines_of_code: number;
  language: string;
  file_size_bytes: number;
}

const text = (fallback: string) => z.string().default(fallback).catch(fallback);
const list = () => z.array(z.string()).default([]).catch([]);

const ProjectSummarySchema = z
  .object({
    project_type: text(NOT_PROVIDED),
    main_functionality: text(NOT_PROVIDED),
    components: list(),
    architecture: text(NOT_PROVIDED),
    use_cases: list(),
  })
  .passthrough();

const FileSummarySchema = z.object({
  file_purpose: text(NOT_ANALYZED),
  main_components: list(),
  possible_role: text(NOT_ANALYZED),
  code_quality: text(NOT_ANALYZED),
  suggested_improvements: list(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(candidate: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(candidate.trim());
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Find a JSON object in a response: the whole text, then a fenced block,
 * then the span from the first '{' to the last '}'.
 */
export function extractJsonObject(response: string): Record<string, unknown> | undefined {
  const direct = parseObject(response);
  if (direct) return direct;

  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/.exec(response);
  if (fenced?.[1]) {
    const parsed = parseObject(fenced[1]);
    if (parsed) return parsed;
  }

  const start = response.indexOf('{');
  const end = response.lastIndexOf('}');
  return start !== -1 && end > start ? parseObject(response.slice(start, end + 1)) : undefined;
}

function stripFences(response: string): string {
  return response.replace(/```json/g, '').replace(/```/g, '');
}

export function buildProjectPrompt(
  dirPath: string,
  stats: ScanStats,
  primaryLanguage: string,
  structure: DirectoryTree
): string {
  return `Based on the statistics below, analyze the type, structure and main functionality of this project.

Project path: ${dirPath}
Total files: ${stats.total_files ?? 0}
Lines of code: ${stats.total_lines_of_code ?? 0}
Primary language: ${primaryLanguage}
Language distribution: ${JSON.stringify(stats.languages ?? {})}
File type distribution: ${JSON.stringify(stats.file_extensions ?? {})}

Directory structure:
${JSON.stringify(structure, null, 2)}

Answer in strict JSON with these fields:
- "project_type": kind of project
- "main_functionality": what it does
- "components": list of main components
- "architecture": short architecture overview
- "use_cases": list of likely use cases

Return only the JSON object, without extra text, code fences or explanations.
`;
}

export function buildFilePrompt(filePath: string, content: string, stats: FileSummaryStats): string {
  const excerpt = content.slice(0, FILE_EXCERPT_CHARS);
  const truncated = content.length > FILE_EXCERPT_CHARS ? '\n...' : '';
  return `Give a brief but complete analysis of the file below.

File name: ${path.basename(filePath)}
File path: ${filePath}
Language: ${stats.language}
Lines of code: ${stats.lines_of_code}
File size: ${stats.file_size_bytes} bytes

\`\`\`
${excerpt}
\`\`\`${truncated}

Answer in strict JSON with these fields:
- "file_purpose": main purpose of the file
- "main_components": list of its main classes, functions or components
- "possible_role": the role it likely plays in its project
- "code_quality": assessment of code quality and structure
- "suggested_improvements": list of suggested improvements

Return only the JSON object, without extra text, code fences or explanations.
`;
}

export interface ProjectSummarizerOptions {
  adapter: AnalysisAdapter;
  filter: PathFilter;
  logger?: ScanLogger;
}

export class ProjectSummarizer {
  private readonly adapter: AnalysisAdapter;
  private readonly filter: PathFilter;
  private readonly logger: ScanLogger;

  constructor(options: ProjectSummarizerOptions) {
    this.adapter = options.adapter;
    this.filter = options.filter;
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Nested listing of a directory down to `depth` levels, leaving out what
   * a scan would leave out
   */
  async directoryStructure(dirPath: string, depth: number = STRUCTURE_DEPTH): Promise<DirectoryTree> {
    if (depth <= 0) return { '...': '...' };

    const tree: DirectoryTree = {};
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      await this.logger.warn('aggregate', 'structure_unreadable', `Cannot list ${dirPath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return tree;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const abs = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        if (this.filter.isExcludedDir(entry.name)) continue;
        tree[entry.name] = await this.directoryStructure(abs, depth - 1);
      } else if (entry.isFile()) {
        if (await this.filter.shouldExclude(abs)) continue;
        const stats = await fs.stat(abs).catch(() => undefined);
        if (stats) tree[entry.name] = { type: 'file', size: stats.size };
      }
    }
    return tree;
  }

  private async ask(prompt: string, subject: string): Promise<string | undefined> {
    let result: AnalysisResult;
    try {
      result = await this.adapter.analyze(prompt);
    } catch (error) {
      result = { success: false, error: classifyProviderError(error) };
    }
    if (!result.success) {
      await this.logger.warn('aggregate', 'summary_failed', `Could not summarize ${subject}: ${result.error.message}`, {
        kind: result.error.kind,
      });
      return undefined;
    }
    return result.response;
  }

  /**
   * Ask the provider to describe a scanned directory
   */
  async summarizeDirectory(
    dirPath: string,
    stats: ScanStats,
    primaryLanguage: string
  ): Promise<Record<string, unknown>> {
    const structure = await this.directoryStructure(dirPath);
    const response = await this.ask(buildProjectPrompt(dirPath, stats, primaryLanguage, structure), dirPath);
    if (response === undefined) return { stats };

    const parsed = extractJsonObject(response);
    if (!parsed) {
      await this.logger.warn('aggregate', 'summary_unparsed', `Project summary for ${dirPath} is not JSON`);
      return {
        project_type: NOT_ANALYZED,
        main_functionality: NOT_ANALYZED,
        components: [],
        architecture: NOT_ANALYZED,
        use_cases: [],
        stats,
        analysis_text: stripFences(response),
      };
    }
    return { ...ProjectSummarySchema.parse(parsed), stats };
  }

  /**
   * Ask the provider to describe a single scanned file, shaped like a
   * project summary
   */
  async summarizeFile(filePath: string, content: string, stats: FileSummaryStats): Promise<Record<string, unknown>> {
    const name = path.basename(filePath);
    const projectType = `${stats.language} file`;

    const response = await this.ask(buildFilePrompt(filePath, content, stats), filePath);
    if (response === undefined) {
      return {
        project_type: projectType,
        main_functionality: name,
        components: [],
        architecture: NOT_ANALYZED,
        use_cases: [],
        stats,
      };
    }

    const parsed = extractJsonObject(response);
    if (!parsed) {
      await this.logger.warn('aggregate', 'summary_unparsed', `File summary for ${filePath} is not JSON`);
      return {
        project_type: projectType,
        main_functionality: `${name} - ${NOT_ANALYZED}`,
        components: [],
        architecture: 'single-file analysis',
        use_cases: [],
        stats,
        analysis_text: response,
      };
    }

    const summary = FileSummarySchema.parse(parsed);
    return {
      project_type: projectType,
      main_functionality: summary.file_purpose,
      components: summary.main_components,
      architecture: summary.possible_role,
      use_cases: [],
      file_analysis: {
        code_quality: summary.code_quality,
        suggested_improvements: summary.suggested_improvements,
      },
      stats,
    };
  }
}
