/**
 * Shallow git clone with retry
 */

import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import { type ScanLogger, silentLogger } from '../logging/scan-logger.js';

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

/**
 * Run a command and capture output; never rejects
 */
export const runCommand: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill('SIGKILL');
    }, timeoutMs);

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      clearTimeout(timer);
      resolve({ stdout, stderr, code: code ?? 1, timedOut });
    });

    proc.on('error', (error) => {
      clearTimeout(timer);
      resolve({ stdout, stderr: stderr || error.message, code: 1, timedOut });
    });
  });

export interface CloneOptions {
  /** Attempts in total */
  retries: number;
  timeoutSeconds: number;
  runner?: CommandRunner;
  sleep?: (ms: number) => Promise<void>;
  logger?: ScanLogger;
}

export type CloneResult = { success: true; attempts: number } | { success: false; attempts: number; error: string };

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function buildCloneArgs(url: string, branch: string, targetDir: string, timeoutSeconds: number): string[] {
  return [
    'clone',
    '--depth',
    '1',
    '--branch',
    branch,
    '--single-branch',
    '--config',
    `http.timeout=${timeoutSeconds}`,
    url,
    targetDir,
  ];
}

/**
 * Clone one branch of a repository at depth 1 into `targetDir`.
 * A failed or timed-out attempt is retried after `attempt * 2` seconds.
 */
export async function cloneRepository(
  url: string,
  branch: string,
  targetDir: string,
  options: CloneOptions
): Promise<CloneResult> {
  const run = options.runner ?? runCommand;
  const wait = options.sleep ?? sleep;
  const logger = options.logger ?? silentLogger();
  const attempts = Math.max(1, options.retries);
  const args = buildCloneArgs(url, branch, targetDir, options.timeoutSeconds);
  let lastError = '';

  for (let attempt = 1; attempt <= attempts; attempt++) {
    await logger.info('import', 'clone_attempt', `Cloning ${url} (${branch}), attempt ${attempt}/${attempts}`);
    // A failed attempt may leave a partial checkout behind
    await fs.rm(targetDir, { recursive: true, force: true });

    const result = await run('git', args, options.timeoutSeconds * 1000);
    if (result.code === 0 && !result.timedOut) {
      await logger.success('import', 'clone_done', `Cloned ${url}`);
      return { success: true, attempts: attempt };
    }

    lastError = result.timedOut ? 'clone timed out' : result.stderr.trim() || `git exited with code ${result.code}`;
    await logger.warn('import', 'clone_failed', `Clone attempt ${attempt}/${attempts} failed: ${lastError}`);

    if (attempt < attempts) {
      await wait(attempt * 2000);
    }
  }

  await logger.error('import', 'clone_gave_up', `Could not clone ${url}: ${lastError}`);
  return { success: false, attempts, error: lastError };
}
