/**
 * Scan Logger
 * Structured, stage-tagged log of everything a scan or rule operation absorbs,
 * optionally persisted as a markdown log file.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  stage: ScanStage;
  event: string;
  message: string;
  data?: Record<string, unknown>;
  level: LogLevel;
}

/**
 * Log levels for filtering and display
 */
export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

/**
 * Stages for categorization
 */
export type ScanStage = 'collect' | 'analyze' | 'aggregate' | 'rules' | 'import' | 'update';

export interface ScanLoggerOptions {
  /** Markdown file entries are persisted to; omitted means memory only */
  logFile?: string;
  /** Mirror entries to stderr */
  echo?: boolean;
  /** Record debug entries */
  debug?: boolean;
}

/**
 * Logger shared by the scanner and the rule repository.
 *
 * File writes are coalesced and chained: entries logged while a write is
 * queued join that write, and `log()` never waits on the file. Call
 * `flush()` before reading the file.
 */
export class ScanLogger {
  private readonly logFile?: string;
  private readonly echo: boolean;
  private readonly debugEnabled: boolean;
  private entries: LogEntry[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private writeQueued = false;

  constructor(options: ScanLoggerOptions = {}) {
    this.logFile = options.logFile;
    this.echo = options.echo ?? false;
    this.debugEnabled = options.debug ?? false;
  }

  /**
   * Log an entry
   */
  async log(
    stage: ScanStage,
    event: string,
    message: string,
    data?: Record<string, unknown>,
    level: LogLevel = 'info'
  ): Promise<void> {
    if (level === 'debug' && !this.debugEnabled) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      stage,
      event,
      message,
      data,
      level,
    };

    this.entries.push(entry);

    if (this.echo) {
      console.error(`${getLevelTag(level)} [${stage}] ${message}`);
    }

    if (this.logFile && !this.writeQueued) {
      this.writeQueued = true;
      this.writeChain = this.writeChain.then(() => {
        this.writeQueued = false;
        return this.persist();
      });
    }
  }

  async info(stage: ScanStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'info');
  }

  async warn(stage: ScanStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'warn');
  }

  async error(stage: ScanStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'error');
  }

  async success(stage: ScanStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'success');
  }

  async debug(stage: ScanStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'debug');
  }

  /**
   * Persist log entries to file. A failed write is reported on stderr and
   * does not fail the operation being logged.
   */
  private async persist(): Promise<void> {
    if (!this.logFile) return;
    try {
      await fs.mkdir(path.dirname(this.logFile), { recursive: true });
      await fs.writeFile(this.logFile, this.formatMarkdown(), 'utf-8');
    } catch (error) {
      console.error('Failed to persist scan log:', error);
    }
  }

  /**
   * Format log entries as markdown
   */
  formatMarkdown(): string {
    const lines: string[] = ['# Scan Log', '', '---', ''];

    // Group entries by date
    const entriesByDate = new Map<string, LogEntry[]>();
    for (const entry of this.entries) {
      const date = entry.timestamp.split('T')[0];
      const group = entriesByDate.get(date) ?? [];
      group.push(entry);
      entriesByDate.set(date, group);
    }

    for (const [date, dateEntries] of entriesByDate) {
      lines.push(`## Session: ${date}`);
      lines.push('');

      for (const entry of dateEntries) {
        const time = entry.timestamp.split('T')[1].split('.')[0];
        lines.push(`### [${time}] ${getLevelTag(entry.level)} **${entry.stage}** - ${entry.message}`);

        if (entry.data && Object.keys(entry.data).length > 0) {
          lines.push('');
          lines.push('```json');
          lines.push(JSON.stringify(entry.data, null, 2));
          lines.push('```');
        }

        lines.push('');
      }
    }

    lines.push('---');
    lines.push('');
    lines.push('## Summary');
    lines.push('');
    lines.push(`- **Total Entries:** ${this.entries.length}`);
    lines.push(`- **Errors:** ${this.entries.filter((e) => e.level === 'error').length}`);
    lines.push(`- **Warnings:** ${this.entries.filter((e) => e.level === 'warn').length}`);
    lines.push('');

    return lines.join('\n');
  }

  /**
   * Wait for pending file writes
   */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForStage(stage: ScanStage): LogEntry[] {
    return this.entries.filter((e) => e.stage === stage);
  }

  getErrors(): LogEntry[] {
    return this.entries.filter((e) => e.level === 'error');
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Get tag for log level
 */
function getLevelTag(level: LogLevel): string {
  switch (level) {
    case 'error':
      return '[ERROR]';
    case 'warn':
      return '[WARN]';
    case 'success':
      return '[OK]';
    case 'debug':
      return '[DEBUG]';
    default:
      return '[INFO]';
  }
}

/**
 * Logger that keeps entries in memory only
 */
export function silentLogger(): ScanLogger {
  return new ScanLogger();
}
