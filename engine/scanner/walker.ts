// engine/scanner/walker.ts — Source tree walker: yields parseable files in deterministic order
import * as fs from 'node:fs';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import { detectLanguage } from './tree-sitter.js';

// Directories to always skip during recursive walk
const SKIP_DIRS = new Set([
  'node_modules',
  '.git',
  'dist',
  'build',
  '.next',
  '.venv',
  'venv',
  '__pycache__',
  'site-packages',
]);

const TEST_DIRS = new Set(['test', 'tests', '__tests__', 'spec']);

const TEST_FILE = /(\.(test|spec)\.[cm]?[jt]sx?$)|(^test_.*\.py$)|(_test\.py$)/;

export interface WalkOptions {
  /** Repository-relative globs; a file must match at least one. */
  include?: string[];
  /** Leave out test files and test directories. */
  excludeTests?: boolean;
}

/**
 * Recursively walk a directory, returning absolute paths of files with a
 * supported language. Skips SKIP_DIRS at any level. Sorted by path.
 */
export function walkSourceFiles(root: string, options: WalkOptions = {}): string[] {
  const results: string[] = [];
  const stack: string[] = [root];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(current, { withFileTypes: true });
    } catch {
      continue;
    }

    for (const entry of entries) {
      if (SKIP_DIRS.has(entry.name)) continue;
      if (options.excludeTests && entry.isDirectory() && TEST_DIRS.has(entry.name)) continue;

      const fullPath = path.join(current, entry.name);

      if (entry.isDirectory()) {
        stack.push(fullPath);
      } else if (entry.isFile() && detectLanguage(entry.name) !== null) {
        if (options.excludeTests && TEST_FILE.test(entry.name)) continue;
        if (options.include && !matchesAny(toPosix(path.relative(root, fullPath)), options.include)) continue;
        results.push(fullPath);
      }
    }
  }

  // Sort for deterministic output
  results.sort();
  return results;
}

function matchesAny(relPath: string, patterns: string[]): boolean {
  return patterns.some((pattern) => minimatch(relPath, pattern, { dot: true }));
}

export function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
