/**
 * In-memory ZIP reading for rule archives (stored and deflated entries)
 */

import { inflateRawSync } from 'node:zlib';

export interface ZipLimits {
  maxEntries: number;
  maxEntryBytes: number;
  maxTotalBytes: number;
}

export const DEFAULT_ZIP_LIMITS: ZipLimits = {
  maxEntries: 5000,
  maxEntryBytes: 2 * 1024 * 1024,
  maxTotalBytes: 64 * 1024 * 1024,
};

export interface ZipFile {
  /** Normalized entry path, forward slashes */
  name: string;
  data: Buffer;
}

interface CentralEntry {
  name: string;
  method: number;
  compressedSize: number;
  size: number;
  localOffset: number;
}

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_SIGNATURE = 0x02014b50;
const LOCAL_SIGNATURE = 0x04034b50;
const EOCD_SIZE = 22;
const METHOD_STORE = 0;
const METHOD_DEFLATE = 8;

/**
 * True when a buffer starts with a local file header
 */
export function isZipBuffer(buf: Buffer): boolean {
  return buf.length >= 4 && buf.readUInt32LE(0) === LOCAL_SIGNATURE;
}

function findEndOfCentralDirectory(buf: Buffer): number {
  const earliest = Math.max(0, buf.length - (EOCD_SIZE + 0xffff));
  for (let i = buf.length - EOCD_SIZE; i >= earliest; i--) {
    if (buf.readUInt32LE(i) === EOCD_SIGNATURE) return i;
  }
  return -1;
}

/**
 * Reject absolute paths and `..` segments
 */
function normalizeEntryName(raw: string): string | null {
  if (!raw || raw.includes('\u0000') || raw.startsWith('/') || raw.startsWith('\\')) return null;
  const parts = raw.split('/').filter((part) => part.length > 0);
  if (parts.some((part) => part === '.' || part === '..')) return null;
  return parts.join('/');
}

function readCentralDirectory(buf: Buffer, limits: ZipLimits): CentralEntry[] {
  const eocd = findEndOfCentralDirectory(buf);
  if (eocd < 0) throw new Error('invalid zip: missing end of central directory');

  const count = buf.readUInt16LE(eocd + 10);
  const size = buf.readUInt32LE(eocd + 12);
  let offset = buf.readUInt32LE(eocd + 16);
  if (count > limits.maxEntries) throw new Error(`zip has more than ${limits.maxEntries} entries`);
  if (offset + size > buf.length) throw new Error('invalid zip: central directory out of bounds');

  const entries: CentralEntry[] = [];
  for (let i = 0; i < count; i++) {
    if (offset + 46 > buf.length || buf.readUInt32LE(offset) !== CENTRAL_SIGNATURE) {
      throw new Error('invalid zip: bad central directory entry');
    }
    const nameLength = buf.readUInt16LE(offset + 28);
    const extraLength = buf.readUInt16LE(offset + 30);
    const commentLength = buf.readUInt16LE(offset + 32);
    const rawName = buf.subarray(offset + 46, offset + 46 + nameLength).toString('utf8');
    const name = normalizeEntryName(rawName);

    if (name && !rawName.endsWith('/')) {
      entries.push({
        name,
        method: buf.readUInt16LE(offset + 10),
        compressedSize: buf.readUInt32LE(offset + 20),
        size: buf.readUInt32LE(offset + 24),
        localOffset: buf.readUInt32LE(offset + 42),
      });
    }
    offset += 46 + nameLength + extraLength + commentLength;
  }
  return entries;
}

function readEntryData(buf: Buffer, entry: CentralEntry, limits: ZipLimits): Buffer | null {
  const offset = entry.localOffset;
  if (offset + 30 > buf.length || buf.readUInt32LE(offset) !== LOCAL_SIGNATURE) {
    throw new Error(`invalid zip: bad local header for ${entry.name}`);
  }
  const start = offset + 30 + buf.readUInt16LE(offset + 26) + buf.readUInt16LE(offset + 28);
  const end = start + entry.compressedSize;
  if (end > buf.length) throw new Error(`invalid zip: data out of bounds for ${entry.name}`);

  const data = buf.subarray(start, end);
  switch (entry.method) {
    case METHOD_STORE:
      return Buffer.from(data);
    case METHOD_DEFLATE:
      return inflateRawSync(data, { maxOutputLength: limits.maxEntryBytes });
    default:
      return null;
  }
}

/**
 * Read the files of an archive that `accept` selects, within the limits.
 * Entries over the per-entry cap or in an unsupported compression method are
 * skipped; reading stops once the total cap would be exceeded.
 *
 * @throws Error when the archive is malformed
 */
export function readZipFiles(
  buf: Buffer,
  accept: (name: string) => boolean,
  limits: ZipLimits = DEFAULT_ZIP_LIMITS
): ZipFile[] {
  const files: ZipFile[] = [];
  let total = 0;

  for (const entry of readCentralDirectory(buf, limits)) {
    if (!accept(entry.name)) continue;
    if (entry.size > limits.maxEntryBytes) continue;
    if (total + entry.size > limits.maxTotalBytes) break;

    const data = readEntryData(buf, entry, limits);
    if (!data) continue;
    files.push({ name: entry.name, data });
    total += data.length;
  }
  return files;
}
