/**
 * CLI command: sourcescan scan
 */

import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { serializeScanResult, type ScanResult } from '../../types/index.js';
import { createScanOrchestrator } from '../../scanner/index.js';
import {
  failSpinner,
  printError,
  printScanSummary,
  printSuccess,
  startSpinner,
  succeedSpinner,
  updateSpinner,
} from '../output.js';
import { loadCommandContext } from './context.js';

export interface ScanCommandOptions {
  workers?: string;
  model?: string;
  output?: string;
  verbose?: boolean;
}

export function parseWorkers(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 64) {
    throw new Error(`--workers must be between 1 and 64, got "${value}"`);
  }
  return parsed;
}

/**
 * Scan a file or directory and print the result
 */
export async function runScan(target: string, options: ScanCommandOptions = {}): Promise<ScanResult> {
  const { config, logger, rules } = await loadCommandContext({ verbose: options.verbose });
  const workers = parseWorkers(options.workers, config.scan.max_workers);
  const orchestrator = createScanOrchestrator(config, { rules, profile: options.model, logger });

  const resolved = path.resolve(target);
  const stats = await fs.stat(resolved);

  const onInterrupt = () => {
    orchestrator.cancel();
    failSpinner('Scan cancelled, waiting for running files to finish');
  };
  process.once('SIGINT', onInterrupt);

  let result: ScanResult;
  try {
    startSpinner(`Scanning ${resolved}`);
    if (stats.isDirectory()) {
      result = await orchestrator.scanDirectory(resolved, workers, (message, percent) => {
        updateSpinner(`[${percent}%] ${message}`);
      });
    } else {
      result = await orchestrator.scanFile(resolved);
    }
    if (result.stats.error) failSpinner(result.stats.error);
    else succeedSpinner('Scan complete');
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await logger.flush();
  }

  printScanSummary(result);

  if (options.output) {
    const outputPath = path.resolve(options.output);
    await fs.writeFile(outputPath, serializeScanResult(result), 'utf-8');
    printSuccess(`Report written to ${outputPath}`);
  }

  return result;
}

export function createScanCommand(): Command {
  return new Command('scan')
    .description('Scan a file or directory for security issues')
    .argument('<path>', 'File or directory to scan')
    .option('-w, --workers <n>', 'Number of files analyzed in parallel')
    .option('-m, --model <profile>', 'Model profile to use')
    .option('-o, --output <file>', 'Write the scan result as JSON')
    .option('-v, --verbose', 'Print log entries')
    .action(async (target: string, opts: ScanCommandOptions) => {
      try {
        await runScan(target, opts);
      } catch (err) {
        failSpinner();
        printError(err instanceof Error ? err.message : 'Scan failed');
        process.exitCode = 1;
      }
    });
}
