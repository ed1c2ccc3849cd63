/**
 * Central type exports
 */

export {
  SeveritySchema,
  ConfidenceSchema,
  ScanTypeSchema,
  FindingSchema,
  ScanStatsSchema,
  ScanResultSchema,
  SEVERITIES,
  totalIssues,
  issuesBySeverity,
  serializeScanResult,
  parseScanResult,
  type Severity,
  type Confidence,
  type ScanType,
  type Finding,
  type ScanStats,
  type ScanResult,
} from './finding.js';

export {
  COMMON_BUCKET,
  STANDARD_BUCKETS,
  RuleSourceSchema,
  RulePatternSchema,
  StoredRuleSchema,
  RuleUpdateRecordSchema,
  RuleBucketsSchema,
  bucketForLanguage,
  countRules,
  type RuleSource,
  type RulePattern,
  type RuleBuckets,
  type RuleUpdateRecord,
} from './rules.js';

export type {
  ProviderErrorKind,
  ProviderError,
  AnalysisResult,
  AnalysisAdapter,
} from './provider.js';
