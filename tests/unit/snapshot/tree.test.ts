import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, symlinkSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  comparePaths,
  createPatternMatcher,
  formatTreeLine,
  listPaths,
  renderTree,
} from '../../../src/snapshot/index.js';

let root: string;

function touch(relativePath: string, content = ''): void {
  const path = join(root, relativePath);
  mkdirSync(join(path, '..'), { recursive: true });
  writeFileSync(path, content);
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'codepaste-tree-'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

// ─── Walker ─────────────────────────────────────────────────────────────────

describe('comparePaths', () => {
  it('orders by component with code-unit comparison', () => {
    const sorted = ['b', 'a/z', 'a', 'A', 'a.txt'].sort(comparePaths);
    expect(sorted).toEqual(['A', 'a', 'a/z', 'a.txt', 'b']);
  });

  it('puts a directory before its children', () => {
    expect(comparePaths('src', 'src/index.ts')).toBeLessThan(0);
    expect(comparePaths('src/index.ts', 'src')).toBeGreaterThan(0);
    expect(comparePaths('src', 'src')).toBe(0);
  });
});

describe('listPaths', () => {
  it('lists files and directories with depth and posix paths', () => {
    touch('src/lib/util.ts');
    touch('README.md');

    const entries = listPaths(root).map(e => [e.relativePath, e.depth, e.isDirectory]);
    expect(entries).toEqual([
      ['README.md', 0, false],
      ['src', 0, true],
      ['src/lib', 1, true],
      ['src/lib/util.ts', 2, false],
    ]);
  });

  it('lists a symlinked directory without descending into it', () => {
    touch('real/inner.txt');
    symlinkSync(join(root, 'real'), join(root, 'alias'));

    const paths = listPaths(root).map(e => e.relativePath);
    expect(paths).toEqual(['alias', 'real', 'real/inner.txt']);
    expect(listPaths(root)[0].isDirectory).toBe(true);
  });

  it('skips dangling symlinks', () => {
    touch('kept.txt');
    symlinkSync(join(root, 'nowhere'), join(root, 'broken'));
    expect(listPaths(root).map(e => e.relativePath)).toEqual(['kept.txt']);
  });
});

// ─── Tree renderer ──────────────────────────────────────────────────────────

describe('renderTree', () => {
  it('renders non-excluded entries in path order', () => {
    touch('src/index.ts');
    touch('src/lib/util.ts');
    touch('README.md');
    touch('node_modules/pkg/index.js');

    const tree = renderTree(root, createPatternMatcher(root));

    expect(tree).toBe([
      '.',
      'README.md',
      'src/',
      '├── index.ts',
      '├── lib/',
      '│   ├── util.ts',
    ].join('\n'));
  });

  it('renders only the root line for an empty project', () => {
    expect(renderTree(root, createPatternMatcher(root))).toBe('.');
  });

  it('formats a single line by depth', () => {
    expect(formatTreeLine({ name: 'a.ts', depth: 0, isDirectory: false })).toBe('a.ts');
    expect(formatTreeLine({ name: 'b', depth: 3, isDirectory: true })).toBe('│   │   ├── b/');
  });
});
