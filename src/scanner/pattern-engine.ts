/**
 * Rule pattern matching against file content
 */

import type { Finding, RulePattern } from '../types/index.js';
import { type ScanLogger, silentLogger } from '../logging/scan-logger.js';

const DEFAULT_DESCRIPTION = 'Potential vulnerability detected';
const DEFAULT_RECOMMENDATION = 'Review this code';

/** Lines kept on each side of a matched line */
const SNIPPET_CONTEXT = 2;

/**
 * Anything that can hand out the active rules for a language.
 * RuleStore is the production implementation.
 */
export interface RuleProvider {
  getPatternsFor(language: string): readonly RulePattern[];
}

function cweFromMetadata(metadata: Record<string, unknown>): string | undefined {
  const cwe = metadata.cwe ?? metadata.CWE;
  if (typeof cwe === 'string') return cwe;
  if (Array.isArray(cwe) && typeof cwe[0] === 'string') return cwe[0];
  return undefined;
}

export class PatternMatchEngine {
  private readonly compiled = new Map<string, RegExp | null>();

  constructor(
    private readonly rules: RuleProvider,
    private readonly logger: ScanLogger = silentLogger()
  ) {}

  /**
   * Evaluate the common rules plus the language's rules against content.
   *
   * One finding per matching rule, in rule order. The first matching line
   * locates it with a snippet of two lines either side; a match that no single
   * line reproduces is reported without a location.
   */
  async match(language: string, content: string, filePath: string): Promise<Finding[]> {
    const findings: Finding[] = [];
    let lines: string[] | undefined;

    for (const rule of this.rules.getPatternsFor(language)) {
      const regex = await this.compile(rule);
      if (!regex || !regex.test(content)) continue;

      lines ??= content.split('\n');
      const index = lines.findIndex((line) => regex.test(line));

      const location =
        index >= 0
          ? {
              line_number: index + 1,
              code_snippet: lines
                .slice(Math.max(0, index - SNIPPET_CONTEXT), index + SNIPPET_CONTEXT + 1)
                .join('\n'),
            }
          : {};
      const cwe = cweFromMetadata(rule.metadata);

      findings.push({
        severity: rule.severity,
        file_path: filePath,
        ...location,
        description: rule.description || DEFAULT_DESCRIPTION,
        recommendation: rule.recommendation || DEFAULT_RECOMMENDATION,
        ...(cwe ? { cwe_id: cwe } : {}),
        confidence: 'medium',
      });
    }

    return findings;
  }

  /**
   * Compile a rule's pattern case-insensitively. Empty and invalid patterns
   * are skipped; the outcome is cached per pattern string.
   */
  private async compile(rule: RulePattern): Promise<RegExp | null> {
    const cached = this.compiled.get(rule.pattern);
    if (cached !== undefined) return cached;

    let regex: RegExp | null = null;
    let failure: string | undefined;
    if (rule.pattern.length > 0) {
      try {
        regex = new RegExp(rule.pattern, 'i');
      } catch (error) {
        failure = error instanceof Error ? error.message : String(error);
      }
    }
    // cached before the warning is awaited so concurrent files log it once
    this.compiled.set(rule.pattern, regex);
    if (failure !== undefined) {
      await this.logger.warn('analyze', 'invalid_pattern', `Skipping rule ${rule.id}: invalid pattern`, {
        pattern: rule.pattern,
        error: failure,
      });
    }
    return regex;
  }
}
