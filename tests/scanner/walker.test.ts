import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { walkSourceFiles } from '../../engine/scanner/walker.js';

const FILES = [
  'backend/app.py',
  'backend/notes.txt',
  'node_modules/lib/index.js',
  '.venv/lib/site.py',
  'src/a.ts',
  'src/types.d.ts',
  'src/a.test.ts',
  'src/__tests__/b.ts',
  'tests/test_app.py',
  'backend/app_test.py',
];

describe('walkSourceFiles', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-walk-'));
    for (const rel of FILES) {
      fs.mkdirSync(path.dirname(path.join(root, rel)), { recursive: true });
      fs.writeFileSync(path.join(root, rel), '');
    }
  });
  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const rel = (files: string[]) => files.map((f) => path.relative(root, f).split(path.sep).join('/'));

  it('returns supported sources in path order, skipping dependency directories', () => {
    expect(rel(walkSourceFiles(root))).toEqual([
      'backend/app.py',
      'backend/app_test.py',
      'src/__tests__/b.ts',
      'src/a.test.ts',
      'src/a.ts',
      'tests/test_app.py',
    ]);
  });

  it('leaves out tests on request', () => {
    expect(rel(walkSourceFiles(root, { excludeTests: true }))).toEqual(['backend/app.py', 'src/a.ts']);
  });

  it('filters by repository-relative globs', () => {
    expect(rel(walkSourceFiles(root, { include: ['backend/**/*.py'] }))).toEqual([
      'backend/app.py',
      'backend/app_test.py',
    ]);
  });

  it('returns nothing for a missing directory', () => {
    expect(walkSourceFiles(path.join(root, 'absent'))).toEqual([]);
  });
});
