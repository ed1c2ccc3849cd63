/**
 * Static outline of a single file: imports, classes, functions and a summary
 */

import path from 'node:path';
import { fileExtension, getFileLanguage } from './languages.js';

export interface FileInfo {
  name: string;
  extension: string;
  language: string;
  imports: string[];
  classes: string[];
  functions: string[];
  /** Leading doc comment, else the first lines of the file */
  file_summary: string;
}

const SUMMARY_LINES = 10;

interface OutlinePatterns {
  imports: RegExp;
  classes: RegExp;
  /** Every capture group is a candidate name; the first non-empty one wins */
  functions: RegExp;
  docstring?: RegExp;
}

const JS_PATTERNS: OutlinePatterns = {
  imports: /^(?:import\s+.+?from\s+.+|const\s+.+?\s*=\s*require\(.+?\).*)$/gm,
  classes: /(?:^|\s)class\s+(\w+)/gm,
  functions: /(?:^|\s)function\s+(\w+)|const\s+(\w+)\s*=\s*(?:function|\()/gm,
  docstring: /^\/\*\*([\s\S]*?)\*\//,
};

const OUTLINES: Readonly<Record<string, OutlinePatterns>> = {
  python: {
    imports: /^(?:from\s+[\w.]+\s+import\s+.+|import\s+.+)$/gm,
    classes: /^\s*class\s+(\w+)/gm,
    functions: /^\s*def\s+(\w+)/gm,
    docstring: /^("""|''')([\s\S]*?)\1/,
  },
  javascript: JS_PATTERNS,
  typescript: JS_PATTERNS,
  java: {
    imports: /^import\s+.+?;/gm,
    classes: /(?:public|private|protected)?\s+class\s+(\w+)/gm,
    functions: /(?:public|private|protected)?\s+\w+\s+(\w+)\s*\(/gm,
  },
};

function firstGroup(match: RegExpMatchArray): string | undefined {
  return match.slice(1).find((group) => group !== undefined && group.length > 0);
}

function docstring(content: string, patterns: OutlinePatterns | undefined): string {
  const match = patterns?.docstring?.exec(content);
  if (!match) return '';
  // the python pattern captures the quote style first
  return (match[2] ?? match[1] ?? '').trim();
}

export function extractFileInfo(filePath: string, content: string): FileInfo {
  const language = getFileLanguage(filePath);
  const patterns = OUTLINES[language];

  const info: FileInfo = {
    name: path.basename(filePath),
    extension: fileExtension(filePath),
    language,
    imports: [],
    classes: [],
    functions: [],
    file_summary: '',
  };

  if (patterns) {
    info.imports = [...content.matchAll(patterns.imports)].map((match) => match[0]);
    info.classes = [...content.matchAll(patterns.classes)].flatMap((match) => firstGroup(match) ?? []);
    info.functions = [...content.matchAll(patterns.functions)].flatMap((match) => firstGroup(match) ?? []);
  }

  info.file_summary = docstring(content, patterns) || content.split('\n').slice(0, SUMMARY_LINES).join('\n');
  return info;
}
