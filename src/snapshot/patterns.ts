/**
 * Pattern Matcher - decides which project paths stay out of a snapshot.
 *
 * Checks run in this order, any hit excludes the path:
 * 1. The snapshot's own output file
 * 2. Skip lists: common metadata files and filename globs
 * 3. Ignore patterns: built-in defaults, extra excludes, then the project's .gitignore
 */

import { existsSync, readFileSync, realpathSync } from 'fs';
import { basename, dirname, join, posix, resolve } from 'path';
import { minimatch } from 'minimatch';

export const DEFAULT_IGNORE_FILE = '.gitignore';

/** Well-known repository metadata, skipped when skipCommon=true */
export const COMMON_FILES: ReadonlySet<string> = new Set([
    'LICENSE',
    'LICENSE.md',
    'LICENSE.txt',
    'CONTRIBUTING.md',
    'CONTRIBUTING',
    'CODE_OF_CONDUCT.md',
    'CODE_OF_CONDUCT',
    'CHANGELOG.md',
    'CHANGELOG',
    'SECURITY.md',
    'SECURITY',
    '.gitattributes',
    '.editorconfig',
    '.dockerignore',
]);

export interface PatternMatcherOptions {
    /** Snapshot destination; excluded even without a pattern */
    outputPath?: string;
    /** Skip LICENSE, CHANGELOG and similar files (default: false) */
    skipCommon?: boolean;
    /** Filename globs to skip, matched against the basename */
    skipFiles?: string[];
    /** Extra ignore patterns, appended after the defaults */
    exclude?: string[];
    /** Ignore file read from the project root (default: .gitignore) */
    ignoreFile?: string;
    /** Verbose logging */
    verbose?: boolean;
}

export interface PatternMatcher {
    /** Patterns in load order: defaults, extra excludes, ignore file */
    readonly patterns: readonly string[];
    /** `!` lines found in the ignore file; parsed but not applied */
    readonly ignoredNegations: readonly string[];
    isExcluded(relativePath: string): boolean;
}

export interface ParsedIgnoreFile {
    patterns: string[];
    negations: string[];
}

interface CompiledPattern {
    readonly source: string;
    readonly directoryOnly: boolean;
    readonly regex: RegExp;
}

/** Built fresh for every matcher so runs never share state */
export function defaultIgnorePatterns(): string[] {
    return [
        '.git/**',
        'node_modules/',
        '**/node_modules/',
        '.git/',
        'dist/',
        'build/',
        'coverage/',
        '.env*',
        '.DS_Store',
        '*.log',
        '*.lock',
        'package-lock.json',
        '__pycache__/',
        '**/__pycache__/',
        '*.pyc',
        '*.pyo',
        '*.pyd',
        '.Python',
        'env/',
        'venv/',
        '.env/',
        '.venv/',
        'ENV/',
        'env.bak/',
        'venv.bak/',
    ];
}

/**
 * Parse gitignore-style content: blank lines and `#` comments are dropped,
 * a leading `./` is stripped, `!` lines are collected separately.
 */
export function parseIgnoreFile(content: string): ParsedIgnoreFile {
    const patterns: string[] = [];
    const negations: string[] = [];

    for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;

        if (line.startsWith('!')) {
            negations.push(line);
            continue;
        }

        patterns.push(line.startsWith('./') ? line.slice(2) : line);
    }

    return { patterns, negations };
}

export function createPatternMatcher(root: string, options: PatternMatcherOptions = {}): PatternMatcher {
    const rootPath = resolve(root);
    const ignoreFileName = options.ignoreFile ?? DEFAULT_IGNORE_FILE;
    const patterns = defaultIgnorePatterns();

    for (const extra of options.exclude ?? []) {
        const trimmed = extra.trim();
        if (trimmed) patterns.push(trimmed.startsWith('./') ? trimmed.slice(2) : trimmed);
    }

    let negations: string[] = [];
    const ignoreFilePath = join(rootPath, ignoreFileName);
    if (existsSync(ignoreFilePath)) {
        const parsed = parseIgnoreFile(readFileSync(ignoreFilePath, 'utf-8'));
        patterns.push(...parsed.patterns);
        negations = parsed.negations;
        if (options.verbose) {
            console.log(`  ${ignoreFileName} found: loaded ${parsed.patterns.length} pattern(s)`);
        }
    } else if (options.verbose) {
        console.log(`  ${ignoreFileName} not found, using default patterns only`);
    }

    if (negations.length > 0) {
        console.warn(`Warning: Negated patterns are not supported and were not applied: ${negations.join(', ')}`);
    }

    const compiled = patterns.map(compilePattern);
    const outputPath = options.outputPath ? canonicalPath(options.outputPath) : undefined;
    const realRoot = canonicalPath(rootPath);
    const skipCommon = options.skipCommon ?? false;
    const skipFiles = options.skipFiles ?? [];

    return {
        patterns,
        ignoredNegations: negations,
        isExcluded(relativePath: string): boolean {
            const rel = toPosixPath(relativePath);

            if (outputPath && canonicalPath(join(realRoot, rel)) === outputPath) return true;

            const name = posix.basename(rel);
            if (skipCommon && COMMON_FILES.has(name)) return true;
            if (skipFiles.some(glob => minimatch(name, glob, { dot: true }))) return true;

            return compiled.some(pattern => matchesPattern(rel, pattern));
        },
    };
}

/**
 * Absolute path with symlinks followed. A path that does not exist yet is
 * resolved through its parent directory.
 */
export function canonicalPath(path: string): string {
    const abs = resolve(path);
    try {
        return realpathSync(abs);
    } catch {
        try {
            return join(realpathSync(dirname(abs)), basename(abs));
        } catch {
            return abs;
        }
    }
}

export function toPosixPath(path: string): string {
    return path.split('\\').join('/');
}

function compilePattern(raw: string): CompiledPattern {
    // Leading slash anchors to the root, which every comparison already is
    const unanchored = raw.startsWith('/') ? raw.slice(1) : raw;
    const collapsed = unanchored.split('**').join('*');

    return {
        source: raw,
        directoryOnly: collapsed.endsWith('/'),
        regex: new RegExp(`^${globToRegexSource(collapsed)}$`, 's'),
    };
}

/**
 * A path matches when the pattern matches the path itself, the path with a
 * trailing slash (directory patterns), or any of its ancestor directories.
 */
function matchesPattern(relativePath: string, pattern: CompiledPattern): boolean {
    if (pattern.directoryOnly && pattern.regex.test(`${relativePath}/`)) return true;
    if (pattern.regex.test(relativePath)) return true;

    const segments = relativePath.split('/');
    for (let i = 1; i < segments.length; i++) {
        if (pattern.regex.test(`${segments.slice(0, i).join('/')}/`)) return true;
    }

    return false;
}

/**
 * Filename-style glob: `*` and `?` cross `/`, `[...]` and `[!...]` are
 * character classes, an unterminated `[` is literal.
 */
export function globToRegexSource(pattern: string): string {
    let regex = '';

    for (let i = 0; i < pattern.length; i++) {
        const char = pattern[i];

        if (char === '*') {
            regex += '.*';
            while (pattern[i + 1] === '*') i++;
            continue;
        }

        if (char === '?') {
            regex += '.';
            continue;
        }

        if (char === '[') {
            const end = findClassEnd(pattern, i);
            if (end === -1) {
                regex += '\\[';
                continue;
            }
            regex += characterClass(pattern.slice(i + 1, end));
            i = end;
            continue;
        }

        regex += escapeRegex(char);
    }

    return regex;
}

function findClassEnd(pattern: string, start: number): number {
    let j = start + 1;
    if (pattern[j] === '!') j++;
    if (pattern[j] === ']') j++;
    while (j < pattern.length && pattern[j] !== ']') j++;
    return j < pattern.length ? j : -1;
}

/**
 * Reversed ranges such as `z-a` are dropped. A class left empty matches
 * nothing, or any character when negated.
 */
function characterClass(body: string): string {
    const negated = body.startsWith('!');
    const chars = negated ? body.slice(1) : body;
    let members = '';

    for (let i = 0; i < chars.length; i++) {
        if (chars[i + 1] === '-' && i + 2 < chars.length) {
            const from = chars[i];
            const to = chars[i + 2];
            if (from <= to) members += `${escapeClassChar(from)}-${escapeClassChar(to)}`;
            i += 2;
            continue;
        }
        members += escapeClassChar(chars[i]);
    }

    if (!members) return negated ? '.' : '(?!)';
    return `[${negated ? '^' : ''}${members}]`;
}

function escapeClassChar(char: string): string {
    return /[\\\]^-]/.test(char) ? `\\${char}` : char;
}

function escapeRegex(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
