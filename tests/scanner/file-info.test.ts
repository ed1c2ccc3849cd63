/**
 * Tests for static file outlines
 */

import { describe, it, expect } from 'vitest';
import { extractFileInfo } from '../../src/scanner/file-info.js';
import { UNKNOWN_LANGUAGE } from '../../src/scanner/languages.js';

describe('extractFileInfo', () => {
  it('should outline a python module and use its docstring as summary', () => {
    const content = [
      '"""Command helpers."""',
      'import os',
      'from pathlib import Path',
      '',
      'class Runner:',
      '    def run(self):',
      '        pass',
      '',
      'def main():',
      '    pass',
    ].join('\n');

    expect(extractFileInfo('/src/tools/runner.py', content)).toEqual({
      name: 'runner.py',
      extension: '.py',
      language: 'python',
      imports: ['import os', 'from pathlib import Path'],
      classes: ['Runner'],
      functions: ['run', 'main'],
      file_summary: 'Command helpers.',
    });
  });

  it('should outline a javascript module', () => {
    const content = [
      '/** Entry point. */',
      'import fs from "node:fs";',
      'const path = require("path");',
      'class App {}',
      'function start() {}',
      'const stop = () => {};',
    ].join('\n');

    const info = extractFileInfo('app/main.js', content);

    expect(info.language).toBe('javascript');
    expect(info.imports).toEqual(['import fs from "node:fs";', 'const path = require("path");']);
    expect(info.classes).toEqual(['App']);
    expect(info.functions).toEqual(['start', 'stop']);
    expect(info.file_summary).toBe('Entry point.');
  });

  it('should outline a java class', () => {
    const content = [
      'import java.util.List;',
      'public class Main {',
      '  public static void main(String[] args) {}',
      '}',
    ].join('\n');

    const info = extractFileInfo('Main.java', content);

    expect(info.imports).toEqual(['import java.util.List;']);
    expect(info.classes).toEqual(['Main']);
    expect(info.functions).toEqual(['main']);
    expect(info.file_summary).toBe(content);
  });

  it('should summarize with the first ten lines when there is no doc comment', () => {
    const lines = Array.from({ length: 12 }, (_, i) => `x${i} = ${i}`);

    const info = extractFileInfo('calc.py', lines.join('\n'));

    expect(info.file_summary).toBe(lines.slice(0, 10).join('\n'));
  });

  it('should leave the outline empty for an unknown language', () => {
    expect(extractFileInfo('notes.xyz', 'import os\nclass A:\n')).toEqual({
      name: 'notes.xyz',
      extension: '.xyz',
      language: UNKNOWN_LANGUAGE,
      imports: [],
      classes: [],
      functions: [],
      file_summary: 'import os\nclass A:\n',
    });
  });
});
