import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  classifyFile,
  detectLanguage,
  fileExtension,
  isBinaryExtension,
  looksLikeText,
} from '../../../src/snapshot/index.js';

let root: string;

function fixture(name: string, content: string | Buffer): string {
  const path = join(root, name);
  writeFileSync(path, content);
  return path;
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'codepaste-classifier-'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe('classifyFile', () => {
  it('classifies plain source as text', () => {
    expect(classifyFile(fixture('main.py', 'def main():\n    return 1\n'))).toBe('text');
  });

  it('treats known binary extensions as binary regardless of content', () => {
    expect(classifyFile(fixture('photo.png', 'actually just text'))).toBe('binary');
    expect(classifyFile(fixture('ARCHIVE.ZIP', 'also text'))).toBe('binary');
  });

  it('treats files over the size limit as binary', () => {
    const path = fixture('big.txt', 'x'.repeat(20));
    expect(classifyFile(path, 10)).toBe('binary');
    expect(classifyFile(path, 20)).toBe('text');
  });

  it('treats content with a NUL byte as binary', () => {
    expect(classifyFile(fixture('data.txt', Buffer.from('abc\0def')))).toBe('binary');
  });

  it('treats an empty file as text', () => {
    expect(classifyFile(fixture('empty.txt', ''))).toBe('text');
  });

  it('treats an unreadable path as binary', () => {
    expect(classifyFile(join(root, 'missing.txt'))).toBe('binary');
  });
});

describe('looksLikeText', () => {
  it('accepts an empty prefix', () => {
    expect(looksLikeText(new Uint8Array())).toBe(true);
  });

  it('rejects a prefix containing NUL', () => {
    expect(looksLikeText(Buffer.from('hello\0world'))).toBe(false);
  });
});

describe('extensions and languages', () => {
  it('lowercases the extension and strips the dot', () => {
    expect(fileExtension('src/App.TSX')).toBe('tsx');
    expect(fileExtension('.gitignore')).toBe('');
    expect(fileExtension('Makefile')).toBe('');
  });

  it('recognizes binary extensions', () => {
    expect(isBinaryExtension('font.woff2')).toBe(true);
    expect(isBinaryExtension('module.wasm')).toBe(true);
    expect(isBinaryExtension('index.ts')).toBe(false);
  });

  it('maps extensions to fence languages', () => {
    expect(detectLanguage('main.py')).toBe('python');
    expect(detectLanguage('src/index.tsx')).toBe('typescript');
    expect(detectLanguage('config.yml')).toBe('yaml');
    expect(detectLanguage('run.sh')).toBe('bash');
    expect(detectLanguage('lib.rs')).toBe('rust');
  });

  it('returns null for unmapped extensions', () => {
    expect(detectLanguage('notes.txt')).toBeNull();
    expect(detectLanguage('Dockerfile')).toBeNull();
  });
});
