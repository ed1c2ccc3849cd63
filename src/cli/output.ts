/**
 * CLI output utilities
 * Handles formatted output, spinners, and scan summaries
 */

import chalk, { type ChalkInstance } from 'chalk';
import ora, { type Ora } from 'ora';
import {
  SEVERITIES,
  issuesBySeverity,
  totalIssues,
  type Finding,
  type ScanResult,
  type Severity,
} from '../types/index.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

const SEVERITY_COLORS: Record<Severity, ChalkInstance> = {
  critical: chalk.bgRed.white,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.blue,
  info: chalk.gray,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Print a header
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * One-line rendering of a finding
 */
export function formatFinding(finding: Finding): string {
  const tag = SEVERITY_COLORS[finding.severity](`[${finding.severity.toUpperCase()}]`);
  const location = finding.line_number ? `${finding.file_path}:${finding.line_number}` : finding.file_path;
  const cwe = finding.cwe_id ? theme.dim(` (${finding.cwe_id})`) : '';
  return `${tag} ${location} ${finding.description}${cwe}`;
}

/**
 * Print the statistics and findings of a scan
 */
export function printScanSummary(result: ScanResult): void {
  printHeader(`Scan ${result.scan_id}`);
  printKeyValue('Path', result.scan_path);
  printKeyValue('Type', result.scan_type);

  const { stats } = result;
  if (stats.total_files !== undefined) printKeyValue('Files', stats.total_files);
  if (stats.total_lines_of_code !== undefined) printKeyValue('Lines of code', stats.total_lines_of_code);
  if (stats.lines_of_code !== undefined) printKeyValue('Lines of code', stats.lines_of_code);
  if (stats.language) printKeyValue('Language', stats.language);
  if (stats.languages && Object.keys(stats.languages).length > 0) {
    const languages = Object.entries(stats.languages)
      .sort(([, a], [, b]) => b - a)
      .map(([language, count]) => `${language} (${count})`)
      .join(', ');
    printKeyValue('Languages', languages);
  }
  if (stats.error) printWarning(stats.error);

  printSection(`Findings: ${totalIssues(result)}`);
  const counts = issuesBySeverity(result);
  for (const severity of SEVERITIES) {
    printKeyValue(severity, counts[severity]);
  }

  if (result.findings.length > 0) {
    console.log();
    const ordered = [...result.findings].sort(
      (a, b) => SEVERITIES.indexOf(a.severity) - SEVERITIES.indexOf(b.severity)
    );
    for (const finding of ordered) {
      console.log(`  ${formatFinding(finding)}`);
    }
  }
}
