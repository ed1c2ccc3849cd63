/**
 * Rule repository type definitions.
 */
import { z } from 'zod';
import { SeveritySchema } from './finding.js';

/** Bucket holding language-agnostic rules; always applied. */
export const COMMON_BUCKET = 'common';

export const RuleSourceSchema = z.enum(['user', 'semgrep', 'builtin']);
export type RuleSource = z.infer<typeof RuleSourceSchema>;

export const RulePatternSchema = z.object({
  id: z.string(),
  name: z.string(),
  pattern: z.string(),
  description: z.string().default(''),
  severity: SeveritySchema.default('medium'),
  languages: z.array(z.string()).default([]),
  source: RuleSourceSchema.default('user'),
  recommendation: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()).default({}),
});
export type RulePattern = z.infer<typeof RulePatternSchema>;

/**
 * Lenient record schema for rule documents read from disk or the network.
 * Fills in the name from the id when it is missing.
 */
export const StoredRuleSchema = z
  .object({
    id: z.string().default(''),
    name: z.string().optional(),
  })
  .passthrough()
  .transform((raw) => ({ ...raw, name: raw.name ?? raw.id }))
  .pipe(RulePatternSchema);

/** language bucket -> ordered rules */
export const RuleBucketsSchema = z.record(z.string(), z.array(RulePatternSchema));
export type RuleBuckets = z.infer<typeof RuleBucketsSchema>;

/**
 * Language names that share a bucket with another name
 */
const BUCKET_ALIASES: Readonly<Record<string, string>> = {
  js: 'javascript',
  ts: 'typescript',
  py: 'python',
  golang: 'go',
  'c++': 'cpp',
  '*': COMMON_BUCKET,
};

/**
 * Bucket a language's rules live in (lower-cased, aliases folded)
 */
export function bucketForLanguage(language: string): string {
  const lower = language.trim().toLowerCase();
  return BUCKET_ALIASES[lower] ?? lower;
}

export interface RuleUpdateRecord {
  /** Unix time in seconds */
  last_update: number;
}

export const RuleUpdateRecordSchema = z.object({
  last_update: z.number(),
});

/**
 * Buckets every directory import starts from; empty ones are dropped afterwards.
 */
export const STANDARD_BUCKETS = [
  COMMON_BUCKET,
  'python',
  'javascript',
  'java',
  'go',
  'ruby',
  'php',
  'c',
  'cpp',
] as const;

/**
 * Count all rules across buckets.
 */
export function countRules(buckets: RuleBuckets): number {
  return Object.values(buckets).reduce((sum, rules) => sum + rules.length, 0);
}
