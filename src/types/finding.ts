/**
 * Finding and scan result type definitions.
 *
 * Zod schemas and TypeScript types for everything a scan produces. The
 * serialized document keeps snake_case field names so reports written by
 * other tools stay readable.
 */
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low', 'info']);
export type Severity = z.infer<typeof SeveritySchema>;

export const SEVERITIES: readonly Severity[] = SeveritySchema.options;

export const ConfidenceSchema = z.enum(['high', 'medium', 'low']);
export type Confidence = z.infer<typeof ConfidenceSchema>;

export const ScanTypeSchema = z.enum(['file', 'directory', 'git-merge']);
export type ScanType = z.infer<typeof ScanTypeSchema>;

// ---------------------------------------------------------------------------
// Finding
// ---------------------------------------------------------------------------

export const FindingSchema = z.object({
  severity: SeveritySchema,
  file_path: z.string(),
  line_number: z.number().int().positive().optional(),
  code_snippet: z.string().optional(),
  description: z.string(),
  recommendation: z.string().optional(),
  cwe_id: z.string().optional(),
  confidence: ConfidenceSchema,
});
export type Finding = Readonly<z.infer<typeof FindingSchema>>;

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

export const ScanStatsSchema = z.object({
  total_files: z.number().int().nonnegative().optional(),
  total_lines_of_code: z.number().int().nonnegative().optional(),
  languages: z.record(z.string(), z.number().int().nonnegative()).optional(),
  file_extensions: z.record(z.string(), z.number().int().nonnegative()).optional(),
  // Single-file scans
  lines_of_code: z.number().int().nonnegative().optional(),
  language: z.string().optional(),
  file_size_bytes: z.number().int().nonnegative().optional(),
  error: z.string().optional(),
});
export type ScanStats = z.infer<typeof ScanStatsSchema>;

// ---------------------------------------------------------------------------
// Scan result
// ---------------------------------------------------------------------------

export const ScanResultSchema = z.object({
  scan_id: z.string(),
  scan_path: z.string(),
  scan_type: ScanTypeSchema,
  timestamp: z.number(),
  issues: z.array(FindingSchema),
  stats: ScanStatsSchema,
  project_info: z.record(z.string(), z.unknown()),
});

export interface ScanResult {
  readonly scan_id: string;
  readonly scan_path: string;
  readonly scan_type: ScanType;
  /** Unix time in seconds */
  readonly timestamp: number;
  readonly findings: readonly Finding[];
  readonly stats: Readonly<ScanStats>;
  readonly project_info: Readonly<Record<string, unknown>>;
}

/**
 * Total number of findings in a result.
 */
export function totalIssues(result: ScanResult): number {
  return result.findings.length;
}

/**
 * Count findings per severity. Every severity is present, zero-filled.
 */
export function issuesBySeverity(result: ScanResult): Record<Severity, number> {
  const counts: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  for (const finding of result.findings) {
    counts[finding.severity] += 1;
  }
  return counts;
}

/**
 * Serialize a scan result to its JSON document form.
 * Findings are written under `issues`.
 */
export function serializeScanResult(result: ScanResult): string {
  const document: z.input<typeof ScanResultSchema> = {
    scan_id: result.scan_id,
    scan_path: result.scan_path,
    scan_type: result.scan_type,
    timestamp: result.timestamp,
    issues: result.findings.map((finding) => ({ ...finding })),
    stats: { ...result.stats },
    project_info: { ...result.project_info },
  };
  return JSON.stringify(document, null, 2);
}

/**
 * Parse a serialized scan result.
 *
 * @throws Error when the document is not valid JSON or does not match the schema.
 */
export function parseScanResult(text: string): ScanResult {
  const parsed = ScanResultSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error(`Invalid scan result document: ${parsed.error.message}`);
  }
  const { issues, ...rest } = parsed.data;
  return { ...rest, findings: issues };
}
