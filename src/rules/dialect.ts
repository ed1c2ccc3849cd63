/**
 * Translation of third-party dialect rules into RulePattern records.
 *
 * The dialect matches code structurally; the stored patterns are plain-text
 * matchers instead. Metavariables are dropped, `...` becomes a lazy wildcard,
 * the alternatives of a `pattern-either` stay regex alternatives and
 * everything else is escaped.
 */

import {
  COMMON_BUCKET,
  SEVERITIES,
  bucketForLanguage,
  type RuleBuckets,
  type RulePattern,
  type Severity,
} from '../types/index.js';

export type RawRule = Record<string, unknown>;

export type ConvertResult = { success: true; rule: RulePattern } | { success: false; reason: string };

const DIALECT_SEVERITIES: Readonly<Record<string, Severity>> = {
  error: 'high',
  warning: 'medium',
  info: 'low',
};

const METAVARIABLE = /\$[A-Z_]+/g;
const ELLIPSIS = '...';
const NAME_FROM_MESSAGE_LENGTH = 50;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Turn one dialect pattern into a plain-text matcher
 */
export function sanitizePattern(pattern: string): string {
  return pattern
    .replace(/\s*\n\s*/g, ' ')
    .replace(METAVARIABLE, '')
    .trim()
    .split(ELLIPSIS)
    .map(escapeRegExp)
    .join('.*?');
}

function patternFromList(entries: unknown[]): string | undefined {
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const direct = stringField(entry, 'pattern');
    if (direct) return direct;
    const nested = entry.patterns;
    if (Array.isArray(nested)) {
      for (const inner of nested) {
        if (isRecord(inner)) {
          const innerPattern = stringField(inner, 'pattern');
          if (innerPattern) return innerPattern;
        }
      }
    }
  }
  return undefined;
}

/**
 * Pull the primary match pattern out of a dialect rule.
 * Returns the alternatives to match, or undefined when the rule has none.
 */
export function extractPrimaryPattern(rule: RawRule): string[] | undefined {
  const pattern = rule.pattern;
  if (typeof pattern === 'string' && pattern.length > 0) return [pattern];
  if (isRecord(pattern)) {
    const nested = stringField(pattern, 'pattern');
    if (nested) return [nested];
  }

  const either = rule['pattern-either'];
  if (Array.isArray(either)) {
    const alternatives: string[] = [];
    for (const item of either) {
      if (typeof item === 'string' && item.length > 0) alternatives.push(item);
      else if (isRecord(item)) {
        const nested = stringField(item, 'pattern');
        if (nested) alternatives.push(nested);
      }
    }
    if (alternatives.length > 0) return alternatives;
  }

  const regex = stringField(rule, 'pattern-regex');
  if (regex) return [regex];

  const inside = stringField(rule, 'pattern-inside');
  if (inside) return [inside];

  const not = stringField(rule, 'pattern-not');
  if (not) return [`(?!${not})`];

  if (Array.isArray(rule.patterns)) {
    const fromPatterns = patternFromList(rule.patterns);
    if (fromPatterns) return [fromPatterns];
  }

  if (Array.isArray(rule.rules)) {
    for (const sub of rule.rules) {
      if (isRecord(sub)) {
        const subPattern = stringField(sub, 'pattern');
        if (subPattern) return [subPattern];
      }
    }
  }

  return undefined;
}

function describeMetadataValue(value: unknown): string {
  return Array.isArray(value) ? value.map(String).join(', ') : String(value);
}

/**
 * Comment-like stand-in for rules without a usable pattern
 */
export function placeholderPattern(rule: RawRule, id: string): string {
  const metadata = rule.metadata;
  if (isRecord(metadata)) {
    if (metadata.cwe !== undefined) return `# CWE-${describeMetadataValue(metadata.cwe)}`;
    if (metadata.owasp !== undefined) return `# OWASP-${describeMetadataValue(metadata.owasp)}`;
  }
  return `# ${id}`;
}

function hasPlaceholderMetadata(rule: RawRule): boolean {
  const metadata = rule.metadata;
  return isRecord(metadata) && (metadata.cwe !== undefined || metadata.owasp !== undefined);
}

export function normalizeSeverity(value: unknown): Severity {
  if (typeof value !== 'string') return 'medium';
  const lower = value.toLowerCase();
  const mapped = DIALECT_SEVERITIES[lower];
  if (mapped) return mapped;
  return SEVERITIES.find((severity) => severity === lower) ?? 'medium';
}

function normalizeLanguages(value: unknown): string[] {
  const raw = Array.isArray(value) ? value : typeof value === 'string' ? [value] : [];
  const languages: string[] = [];
  for (const item of raw) {
    if (typeof item !== 'string' && typeof item !== 'number') continue;
    const bucket = bucketForLanguage(String(item));
    if (bucket && !languages.includes(bucket)) languages.push(bucket);
  }
  return languages;
}

/**
 * Convert one dialect rule
 */
export function convertDialectRule(rule: RawRule): ConvertResult {
  const id = typeof rule.id === 'string' ? rule.id : typeof rule.id === 'number' ? String(rule.id) : '';
  const message = stringField(rule, 'message') ?? '';

  let pattern = (extractPrimaryPattern(rule) ?? [])
    .map(sanitizePattern)
    .filter((alternative) => alternative.length > 0)
    .join('|');
  if (!pattern) {
    // an id-less rule is kept on its metadata; the store names it on merge
    if (!id && !hasPlaceholderMetadata(rule)) {
      return { success: false, reason: 'rule has neither an id, a pattern nor CWE/OWASP metadata' };
    }
    pattern = sanitizePattern(placeholderPattern(rule, id));
  }

  const metadata = isRecord(rule.metadata) ? rule.metadata : {};
  const converted: RulePattern = {
    id,
    name: stringField(rule, 'name') ?? (message.slice(0, NAME_FROM_MESSAGE_LENGTH) || id),
    pattern,
    description: message,
    severity: normalizeSeverity(rule.severity),
    languages: normalizeLanguages(rule.languages),
    source: 'semgrep',
    metadata,
  };
  return { success: true, rule: converted };
}

/** Keys `extractPrimaryPattern` reads a pattern from */
const PATTERN_KEYS = ['pattern', 'pattern-either', 'pattern-regex', 'pattern-inside', 'pattern-not', 'patterns'];

function hasPatternKey(record: Record<string, unknown>): boolean {
  return PATTERN_KEYS.some((key) => key in record);
}

/**
 * Find the rule records in a parsed document, whatever its shape: a `rules`
 * list, a single inline rule, named sub-documents, or a bare list.
 */
export function extractRawRules(content: unknown): RawRule[] {
  let candidates: unknown[] = [];

  if (Array.isArray(content)) {
    candidates = content;
  } else if (isRecord(content)) {
    if (Array.isArray(content.rules)) {
      candidates = content.rules;
    } else if ('id' in content && hasPatternKey(content)) {
      candidates = [content];
    } else {
      for (const value of Object.values(content)) {
        if (!isRecord(value)) continue;
        if (Array.isArray(value.rules)) candidates.push(...value.rules);
        else if (hasPatternKey(value)) candidates.push(value);
      }
    }
  }

  return candidates.filter(isRecord);
}

/**
 * Append a rule to every bucket it declares, or to the common bucket
 */
export function addToBuckets(buckets: RuleBuckets, rule: RulePattern): void {
  const targets = rule.languages.length > 0 ? rule.languages : [COMMON_BUCKET];
  for (const bucket of targets) {
    (buckets[bucket] ??= []).push(rule);
  }
}

/**
 * Concatenate `source` into `target`, bucket by bucket
 */
export function appendBuckets(target: RuleBuckets, source: RuleBuckets): void {
  for (const [bucket, rules] of Object.entries(source)) {
    (target[bucket] ??= []).push(...rules);
  }
}

export interface DocumentConversion {
  buckets: RuleBuckets;
  /** Rule records found in the document, converted or not */
  found: number;
  /** Reasons for rules that could not be converted */
  dropped: string[];
}

/**
 * Convert every rule of a parsed document
 */
export function convertRulesDocument(content: unknown): DocumentConversion {
  const buckets: RuleBuckets = {};
  const dropped: string[] = [];
  const raws = extractRawRules(content);
  for (const raw of raws) {
    const result = convertDialectRule(raw);
    if (result.success) {
      addToBuckets(buckets, result.rule);
    } else {
      dropped.push(result.reason);
    }
  }
  return { buckets, found: raws.length, dropped };
}
