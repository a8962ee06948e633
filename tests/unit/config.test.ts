import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig, CONFIG_TEMPLATE } from '../../src/config.js';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { join, resolve } from 'path';
import { tmpdir } from 'os';

// ── Helpers ─────────────────────────────────────────────────────────────────

const TEST_DIR = join(tmpdir(), 'codepaste-config-test-' + Date.now());

function writeConfig(filename: string, content: unknown): string {
  mkdirSync(TEST_DIR, { recursive: true });
  const filepath = join(TEST_DIR, filename);
  writeFileSync(filepath, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
  return filepath;
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  // ── File loading ──────────────────────────────────────────────────────────

  it('throws if config file does not exist', () => {
    expect(() => loadConfig('/nonexistent/path/config.json'))
      .toThrow('Config file not found');
  });

  it('throws on invalid JSON', () => {
    const path = writeConfig('bad.json', '{ not valid json }');
    expect(() => loadConfig(path)).toThrow('Invalid JSON');
  });

  it('throws if config is an array', () => {
    const path = writeConfig('array.json', [1, 2, 3]);
    expect(() => loadConfig(path)).toThrow('must contain a JSON object');
  });

  it('throws if config is null', () => {
    const path = writeConfig('null.json', 'null');
    expect(() => loadConfig(path)).toThrow('must contain a JSON object');
  });

  it('loads a valid empty config', () => {
    const path = writeConfig('empty.json', {});
    expect(loadConfig(path)).toEqual({});
  });

  // ── Fields ────────────────────────────────────────────────────────────────

  it('loads boolean fields', () => {
    const path = writeConfig('bools.json', {
      force: true,
      summary: false,
      tokens: true,
      skipCommon: true,
      verbose: true,
    });
    expect(loadConfig(path)).toEqual({
      force: true,
      summary: false,
      tokens: true,
      skipCommon: true,
      verbose: true,
    });
  });

  it('loads selection fields', () => {
    const path = writeConfig('selection.json', {
      exclude: ['*.min.js', 'fixtures/'],
      skipFiles: ['*.test.ts'],
      ignoreFile: '.codepasteignore',
      maxFileSize: 2048,
    });
    const config = loadConfig(path);
    expect(config.exclude).toEqual(['*.min.js', 'fixtures/']);
    expect(config.skipFiles).toEqual(['*.test.ts']);
    expect(config.ignoreFile).toBe('.codepasteignore');
    expect(config.maxFileSize).toBe(2048);
  });

  it('resolves a relative output from the config directory', () => {
    const path = writeConfig('output.json', { output: 'snap.md' });
    expect(loadConfig(path).output).toBe(resolve(TEST_DIR, 'snap.md'));
  });

  it('keeps an absolute output as is', () => {
    const path = writeConfig('abs-output.json', { output: '/tmp/elsewhere/snap.md' });
    expect(loadConfig(path).output).toBe('/tmp/elsewhere/snap.md');
  });

  // ── Validation ────────────────────────────────────────────────────────────

  it('rejects a non-boolean force', () => {
    const path = writeConfig('force.json', { force: 'yes' });
    expect(() => loadConfig(path)).toThrow('Config "force" must be a boolean');
  });

  it('rejects a non-string output', () => {
    const path = writeConfig('out.json', { output: 42 });
    expect(() => loadConfig(path)).toThrow('Config "output" must be a string');
  });

  it('rejects a fractional or negative maxFileSize', () => {
    expect(() => loadConfig(writeConfig('frac.json', { maxFileSize: 1.5 })))
      .toThrow('Config "maxFileSize" must be a positive integer');
    expect(() => loadConfig(writeConfig('neg.json', { maxFileSize: -1 })))
      .toThrow('Config "maxFileSize" must be a positive integer');
  });

  it('rejects exclude entries that are not strings', () => {
    const path = writeConfig('exclude.json', { exclude: ['ok', 3] });
    expect(() => loadConfig(path)).toThrow('Config "exclude" must be an array of strings');
  });

  it('warns about unknown keys', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const path = writeConfig('unknown.json', { force: true, colour: 'blue' });
    expect(loadConfig(path)).toEqual({ force: true });
    expect(warn).toHaveBeenCalledWith('Warning: Unknown config keys ignored: colour');
  });

  // ── Template ──────────────────────────────────────────────────────────────

  it('template round-trips through loadConfig', () => {
    const path = writeConfig('template.json', CONFIG_TEMPLATE);
    expect(loadConfig(path)).toEqual(CONFIG_TEMPLATE);
  });
});
