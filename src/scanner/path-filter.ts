/**
 * Path eligibility checks for scanning
 */

import { promises as fs } from 'node:fs';
import type { ScanSettings } from '../config/schema.js';
import { fileExtension } from './languages.js';

const MIME_BY_EXTENSION: Readonly<Record<string, string>> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.ico': 'image/x-icon',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mov': 'video/quicktime',
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.ogg': 'audio/ogg',
  '.pdf': 'application/pdf',
  '.doc': 'application/msword',
  '.xls': 'application/vnd.ms-excel',
  '.ppt': 'application/vnd.ms-powerpoint',
  '.zip': 'application/zip',
  '.rar': 'application/x-rar-compressed',
  '.bin': 'application/octet-stream',
  '.exe': 'application/octet-stream',
  '.dll': 'application/octet-stream',
  '.so': 'application/octet-stream',
  '.class': 'application/octet-stream',
};

const BINARY_MIME_PREFIXES = [
  'image/',
  'audio/',
  'video/',
  'application/octet-stream',
  'application/zip',
  'application/x-rar',
  'application/pdf',
  'application/msword',
  'application/vnd.ms-',
];

/** Bytes read when sniffing content */
const SNIFF_BYTES = 1024;

/**
 * MIME type guessed from the extension, if known
 */
export function guessMimeType(filePath: string): string | undefined {
  return MIME_BY_EXTENSION[fileExtension(filePath)];
}

/**
 * True when a chunk of bytes does not look like text: it holds a NUL byte
 * or is not valid UTF-8.
 */
export function looksBinary(chunk: Uint8Array): boolean {
  if (chunk.includes(0)) return true;
  try {
    // stream: a multi-byte character cut at the chunk end is not an error
    new TextDecoder('utf-8', { fatal: true }).decode(chunk, { stream: true });
    return false;
  } catch {
    return true;
  }
}

export interface PathFilterOptions {
  excludedDirs: readonly string[];
  /** Suffixes such as '.png' or '.tar.gz' */
  excludedExtensions: readonly string[];
  maxFileSizeMb: number;
}

export class PathFilter {
  private readonly excludedDirs: ReadonlySet<string>;
  private readonly excludedExtensions: readonly string[];
  private readonly maxFileSizeBytes: number;

  constructor(options: PathFilterOptions) {
    this.excludedDirs = new Set(options.excludedDirs);
    this.excludedExtensions = options.excludedExtensions.map((ext) => ext.toLowerCase());
    this.maxFileSizeBytes = options.maxFileSizeMb * 1024 * 1024;
  }

  static fromSettings(settings: ScanSettings): PathFilter {
    return new PathFilter({
      excludedDirs: settings.excluded_dirs,
      excludedExtensions: settings.excluded_files,
      maxFileSizeMb: settings.max_file_size_mb,
    });
  }

  isExcludedDir(name: string): boolean {
    return this.excludedDirs.has(name);
  }

  hasExcludedSegment(filePath: string): boolean {
    return filePath.split(/[\\/]/).some((segment) => this.excludedDirs.has(segment));
  }

  hasExcludedExtension(filePath: string): boolean {
    const lower = filePath.toLowerCase();
    return this.excludedExtensions.some((ext) => lower.endsWith(ext));
  }

  /**
   * Decide whether a path is left out of a scan.
   * Size and content checks apply to regular files only.
   */
  async shouldExclude(filePath: string): Promise<boolean> {
    if (this.hasExcludedSegment(filePath)) return true;
    if (this.hasExcludedExtension(filePath)) return true;

    let stats;
    try {
      stats = await fs.stat(filePath);
    } catch {
      return false;
    }
    if (!stats.isFile()) return false;
    if (stats.size > this.maxFileSizeBytes) return true;

    return this.isBinaryFile(filePath);
  }

  /**
   * MIME heuristic first, then a sniff of the first kilobyte.
   * An unreadable file counts as binary.
   */
  async isBinaryFile(filePath: string): Promise<boolean> {
    const mime = guessMimeType(filePath);
    if (mime && BINARY_MIME_PREFIXES.some((prefix) => mime.startsWith(prefix))) {
      return true;
    }

    let handle;
    try {
      handle = await fs.open(filePath, 'r');
      const buffer = Buffer.alloc(SNIFF_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
      return looksBinary(buffer.subarray(0, bytesRead));
    } catch {
      return true;
    } finally {
      await handle?.close();
    }
  }
}

