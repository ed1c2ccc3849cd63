/**
 * Shared stand-ins for scanner tests
 */

import { RulePatternSchema, bucketForLanguage, type AnalysisAdapter, type AnalysisResult, type RulePattern } from '../../src/types/index.js';
import type { RuleProvider } from '../../src/scanner/pattern-engine.js';

export function makeRule(fields: { id: string; pattern: string } & Partial<RulePattern>): RulePattern {
  return RulePatternSchema.parse({ name: fields.id, ...fields });
}

/**
 * Rule provider over fixed buckets, resolving languages the way the store does
 */
export class StaticRules implements RuleProvider {
  constructor(private readonly buckets: Record<string, RulePattern[]>) {}

  getPatternsFor(language: string): readonly RulePattern[] {
    return [...(this.buckets.common ?? []), ...(this.buckets[bucketForLanguage(language)] ?? [])];
  }
}

/**
 * Adapter answering every prompt with the same result
 */
export class StubAdapter implements AnalysisAdapter {
  readonly label = 'stub:test';
  readonly prompts: string[] = [];

  constructor(private readonly result: AnalysisResult = { success: true, response: '[]' }) {}

  async analyze(prompt: string): Promise<AnalysisResult> {
    this.prompts.push(prompt);
    return this.result;
  }
}
