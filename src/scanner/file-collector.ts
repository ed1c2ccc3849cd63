/**
 * Candidate file discovery
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { PathFilter } from './path-filter.js';
import { type ScanLogger, silentLogger } from '../logging/scan-logger.js';

export class FileCollector {
  constructor(
    private readonly filter: PathFilter,
    private readonly logger: ScanLogger = silentLogger()
  ) {}

  /**
   * Walk a directory depth-first and return every file that passes the filter.
   * Excluded directories are pruned before they are read. Entries are visited
   * in name order, so the result is stable for an unchanged tree. Symlinked
   * files are collected; symlinked directories are not followed.
   */
  async collect(rootPath: string): Promise<string[]> {
    const files: string[] = [];

    const recurse = async (dir: string): Promise<void> => {
      let entries;
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        await this.logger.warn('collect', 'dir_unreadable', `Skipping unreadable directory ${dir}`, {
          error: error instanceof Error ? error.message : String(error),
        });
        return;
      }
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        const abs = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (this.filter.isExcludedDir(entry.name)) continue;
          await recurse(abs);
        } else if (entry.isFile() || (entry.isSymbolicLink() && (await this.isLinkedFile(abs)))) {
          if (!(await this.filter.shouldExclude(abs))) {
            files.push(abs);
          }
        }
      }
    };

    await recurse(rootPath);
    await this.logger.debug('collect', 'collected', `Collected ${files.length} files under ${rootPath}`);
    return files;
  }

  private async isLinkedFile(linkPath: string): Promise<boolean> {
    try {
      return (await fs.stat(linkPath)).isFile();
    } catch (error) {
      await this.logger.debug('collect', 'link_broken', `Skipping broken link ${linkPath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
