/**
 * File Classifier - Text/Binary decision and language detection.
 *
 * Text files are inlined verbatim; binary files get a placeholder.
 */

import { closeSync, openSync, readFileSync, readSync, statSync } from 'fs';
import { extname } from 'path';
import { fileURLToPath } from 'url';
import { detect } from 'chardet';

export type Classification = 'text' | 'binary';

/** Files above this size are never inlined (bytes) */
export const DEFAULT_MAX_FILE_SIZE = 1_000_000;

/** Prefix length read for the content sniff (bytes) */
export const SNIFF_BYTES = 4096;

const BINARY_EXTENSIONS: ReadonlySet<string> = loadBinaryExtensions();

/** Map file extension to markdown language hint */
const LANGUAGE_BY_EXTENSION: ReadonlyMap<string, string> = new Map(Object.entries({
    js: 'javascript', jsx: 'javascript', mjs: 'javascript', cjs: 'javascript',
    ts: 'typescript', tsx: 'typescript',
    py: 'python',
    rb: 'ruby',
    java: 'java',
    kt: 'kotlin',
    cpp: 'cpp',
    c: 'c',
    cs: 'csharp',
    php: 'php',
    go: 'go',
    rs: 'rust',
    swift: 'swift',
    r: 'r',
    sql: 'sql',
    yaml: 'yaml', yml: 'yaml',
    toml: 'toml',
    json: 'json',
    md: 'markdown',
    html: 'html',
    css: 'css',
    scss: 'scss',
    less: 'less',
    sh: 'bash', bash: 'bash',
    dockerfile: 'dockerfile',
}));

function loadBinaryExtensions(): ReadonlySet<string> {
    const file = fileURLToPath(new URL('../../data/binary-extensions.json', import.meta.url));
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    if (!Array.isArray(parsed) || !parsed.every(ext => typeof ext === 'string')) {
        throw new Error(`Binary extension list must be an array of strings: ${file}`);
    }
    return new Set<string>(parsed);
}

/** Lowercased extension without the dot ('' for none, including dotfiles) */
export function fileExtension(path: string): string {
    return extname(path).slice(1).toLowerCase();
}

export function isBinaryExtension(path: string): boolean {
    return BINARY_EXTENSIONS.has(fileExtension(path));
}

/** Language tag for the code fence, null when the extension is unmapped */
export function detectLanguage(path: string): string | null {
    return LANGUAGE_BY_EXTENSION.get(fileExtension(path)) ?? null;
}

/**
 * Classify a file on disk.
 *
 * Known binary extension, then size limit, then a sniff of the first
 * SNIFF_BYTES bytes. Any stat or read failure counts as binary.
 */
export function classifyFile(absolutePath: string, sizeLimit: number = DEFAULT_MAX_FILE_SIZE): Classification {
    if (isBinaryExtension(absolutePath)) return 'binary';

    try {
        if (statSync(absolutePath).size > sizeLimit) return 'binary';
        return looksLikeText(readPrefix(absolutePath, SNIFF_BYTES)) ? 'text' : 'binary';
    } catch {
        return 'binary';
    }
}

/**
 * Content sniff: an encoding must be detectable and there must be no NUL byte.
 * An empty prefix is an empty file, which is text.
 */
export function looksLikeText(prefix: Uint8Array): boolean {
    if (prefix.length === 0) return true;
    if (detect(prefix) === null) return false;
    return !prefix.includes(0);
}

function readPrefix(absolutePath: string, length: number): Buffer {
    const fd = openSync(absolutePath, 'r');
    try {
        const buffer = Buffer.alloc(length);
        const bytesRead = readSync(fd, buffer, 0, length, 0);
        return buffer.subarray(0, bytesRead);
    } finally {
        closeSync(fd);
    }
}
