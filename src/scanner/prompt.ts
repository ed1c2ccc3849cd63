/**
 * Analysis prompt construction and response parsing
 */

import { z } from 'zod';
import {
  ConfidenceSchema,
  SeveritySchema,
  type Finding,
  type ProviderError,
  type ProviderErrorKind,
} from '../types/index.js';

/**
 * Build the analysis prompt for one file
 */
export function buildAnalysisPrompt(filePath: string, language: string, content: string): string {
  return `Analyze the following ${language} code for security vulnerabilities, potential bugs and bad practices.
File path: ${filePath}

Pay particular attention to:
1. SQL injection, XSS and other common vulnerabilities
2. Unsafe dependencies and API usage
3. Hard-coded secrets and credentials
4. Unhandled errors and exceptions
5. Memory and resource leaks
6. Logic errors
7. Code quality problems

\`\`\`
${content}
\`\`\`

Return the result in the following JSON format:
\`\`\`json
[
  {
    "severity": "critical|high|medium|low|info",
    "description": "Description of the issue",
    "line_number": 42,
    "code_snippet": "The offending code",
    "recommendation": "How to fix it",
    "cwe_id": "CWE identifier",
    "confidence": "high|medium|low"
  }
]
\`\`\`
If no issues are found, return an empty array [].
`;
}

const lowerCase = (value: string) => value.toLowerCase();

/**
 * One finding as a model reports it. Every field tolerates garbage.
 */
const ReportedFindingSchema = z.object({
  severity: z.string().transform(lowerCase).pipe(SeveritySchema).catch('medium'),
  description: z.string().min(1).catch('No description provided'),
  line_number: z.coerce.number().int().positive().optional().catch(undefined),
  code_snippet: z.string().optional().catch(undefined),
  recommendation: z.string().optional().catch(undefined),
  cwe_id: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
  confidence: z.string().transform(lowerCase).pipe(ConfidenceSchema).catch('medium'),
});

export type ParseFindingsResult =
  | { success: true; findings: Finding[] }
  | { success: false; reason: string };

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/g;

/**
 * Locate the JSON array in a response: a fenced block first, then the span
 * from the first '[' to the last ']', then the whole text.
 */
export function extractJsonArray(response: string): string {
  let candidate = '';
  for (const match of response.matchAll(FENCED_BLOCK)) {
    if (match[1].trim()) {
      candidate = match[1];
      break;
    }
  }
  if (!candidate) candidate = response;

  candidate = candidate.trim();
  if (!candidate.startsWith('[')) {
    const start = candidate.indexOf('[');
    const end = candidate.lastIndexOf(']');
    if (start !== -1 && end > start) {
      candidate = candidate.slice(start, end + 1);
    }
  }
  return candidate;
}

/**
 * Parse a model response into findings for one file.
 * Array items that are not objects are skipped.
 */
export function parseFindingsResponse(response: string, filePath: string): ParseFindingsResult {
  let data: unknown;
  try {
    data = JSON.parse(extractJsonArray(response));
  } catch (error) {
    return { success: false, reason: error instanceof Error ? error.message : String(error) };
  }
  if (!Array.isArray(data)) {
    return { success: false, reason: 'response is not a JSON array' };
  }

  const findings: Finding[] = [];
  for (const item of data) {
    const parsed = ReportedFindingSchema.safeParse(item);
    if (!parsed.success) continue;
    const { line_number, code_snippet, recommendation, cwe_id, ...required } = parsed.data;
    findings.push({
      ...required,
      file_path: filePath,
      ...(line_number !== undefined ? { line_number } : {}),
      ...(code_snippet !== undefined ? { code_snippet } : {}),
      ...(recommendation !== undefined ? { recommendation } : {}),
      ...(cwe_id !== undefined ? { cwe_id } : {}),
    });
  }
  return { success: true, findings };
}

/**
 * Finding reported when a response could not be parsed
 */
export function parseFailureFinding(filePath: string): Finding {
  return {
    severity: 'info',
    file_path: filePath,
    description: 'The model response could not be parsed as JSON; semantic analysis is incomplete for this file',
    recommendation: 'Check the API settings and retry',
    confidence: 'low',
  };
}

const FAILURE_LABELS: Record<ProviderErrorKind, string> = {
  auth: 'authentication',
  timeout: 'timeout',
  connection: 'connection',
  other: 'request',
};

const FAILURE_RECOMMENDATIONS: Record<ProviderErrorKind, string> = {
  auth: 'Check that the API key configured for the model profile is valid',
  timeout: 'Increase scan.timeout_seconds or retry the scan',
  connection: 'Check network connectivity and the provider base URL',
  other: 'Check the API configuration and retry',
};

/**
 * Finding reported when the analysis provider failed
 */
export function providerFailureFinding(filePath: string, error: ProviderError): Finding {
  return {
    severity: 'info',
    file_path: filePath,
    description: `Analysis ${FAILURE_LABELS[error.kind]} error: ${error.message}`,
    recommendation: FAILURE_RECOMMENDATIONS[error.kind],
    confidence: 'high',
  };
}
