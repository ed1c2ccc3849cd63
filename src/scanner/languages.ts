/**
 * Language detection by file extension
 */

import path from 'node:path';

export const UNKNOWN_LANGUAGE = 'unknown';

const LANGUAGE_BY_EXTENSION: Readonly<Record<string, string>> = {
  '.py': 'python',
  '.js': 'javascript',
  '.ts': 'typescript',
  '.jsx': 'javascript',
  '.tsx': 'typescript',
  '.java': 'java',
  '.c': 'c',
  '.cpp': 'c++',
  '.cs': 'c#',
  '.go': 'golang',
  '.rs': 'rust',
  '.php': 'php',
  '.rb': 'ruby',
  '.swift': 'swift',
  '.kt': 'kotlin',
  '.scala': 'scala',
  '.m': 'objective-c',
  '.h': 'c',
  '.sh': 'bash',
  '.bat': 'batch',
  '.ps1': 'powershell',
  '.sql': 'sql',
  '.html': 'html',
  '.css': 'css',
  '.scss': 'scss',
  '.less': 'less',
  '.xml': 'xml',
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.md': 'markdown',
  '.tex': 'latex',
  '.r': 'r',
  '.dart': 'dart',
  '.lua': 'lua',
  '.pl': 'perl',
  '.groovy': 'groovy',
  '.vb': 'visual basic',
};

/**
 * Lower-cased extension of a path, including the dot ('' when there is none)
 */
export function fileExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Language name for a file, or 'unknown'
 */
export function getFileLanguage(filePath: string): string {
  return LANGUAGE_BY_EXTENSION[fileExtension(filePath)] ?? UNKNOWN_LANGUAGE;
}

/**
 * Count newline-terminated lines plus a trailing unterminated one.
 */
export function countLines(content: string): number {
  if (content.length === 0) return 0;
  let lines = 0;
  for (let i = 0; i < content.length; i++) {
    if (content.charCodeAt(i) === 10) lines++;
  }
  return content.endsWith('\n') ? lines : lines + 1;
}
