/**
 * CLI Config File Support
 *
 * One JSON file to control a snapshot run:
 * - Output (output, force, summary, tokens)
 * - Selection (exclude, skipFiles, skipCommon, ignoreFile, maxFileSize)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';

export const DEFAULT_CONFIG_FILE = 'codepaste.config.json';

export interface CliConfig {
    // Output
    output?: string;
    force?: boolean;
    summary?: boolean;
    tokens?: boolean;

    // Selection
    exclude?: string[];
    skipFiles?: string[];
    skipCommon?: boolean;
    ignoreFile?: string;
    maxFileSize?: number;

    // Misc
    verbose?: boolean;
}

const KNOWN_KEYS = new Set<string>([
    'output', 'force', 'summary', 'tokens',
    'exclude', 'skipFiles', 'skipCommon', 'ignoreFile', 'maxFileSize',
    'verbose',
]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertString(obj: Record<string, unknown>, key: string): string {
    const value = obj[key];
    if (typeof value !== 'string') throw new Error(`Config "${key}" must be a string`);
    return value;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const value = obj[key];
    if (typeof value !== 'boolean') throw new Error(`Config "${key}" must be a boolean`);
    return value;
}

function assertPositiveInteger(obj: Record<string, unknown>, key: string): number {
    const value = obj[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
        throw new Error(`Config "${key}" must be a positive integer`);
    }
    return value;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const value = obj[key];
    if (!Array.isArray(value)) {
        throw new Error(`Config "${key}" must be an array of strings`);
    }
    const strings: string[] = [];
    for (const item of value) {
        if (typeof item !== 'string') throw new Error(`Config "${key}" must be an array of strings`);
        strings.push(item);
    }
    return strings;
}

/**
 * Load and validate a config file.
 *
 * - Resolves configPath relative to CWD
 * - A relative "output" resolves from the config file's directory
 * - Throws on missing file, invalid JSON or a non-object document
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new Error(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new Error(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isPlainObject(parsed)) {
        throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const unknownKeys = Object.keys(parsed).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};
    const configDir = dirname(absolutePath);

    // Output
    if (parsed.output !== undefined) {
        const output = assertString(parsed, 'output');
        config.output = isAbsolute(output) ? output : resolve(configDir, output);
    }
    if (parsed.force !== undefined) config.force = assertBoolean(parsed, 'force');
    if (parsed.summary !== undefined) config.summary = assertBoolean(parsed, 'summary');
    if (parsed.tokens !== undefined) config.tokens = assertBoolean(parsed, 'tokens');

    // Selection
    if (parsed.exclude !== undefined) config.exclude = assertStringArray(parsed, 'exclude');
    if (parsed.skipFiles !== undefined) config.skipFiles = assertStringArray(parsed, 'skipFiles');
    if (parsed.skipCommon !== undefined) config.skipCommon = assertBoolean(parsed, 'skipCommon');
    if (parsed.ignoreFile !== undefined) config.ignoreFile = assertString(parsed, 'ignoreFile');
    if (parsed.maxFileSize !== undefined) config.maxFileSize = assertPositiveInteger(parsed, 'maxFileSize');

    // Misc
    if (parsed.verbose !== undefined) config.verbose = assertBoolean(parsed, 'verbose');

    return config;
}

/**
 * Default config template for the `init` command.
 * Shows every available option with its default.
 */
export const CONFIG_TEMPLATE: CliConfig = {
    // Output
    force: false,
    summary: true,
    tokens: false,

    // Selection
    exclude: ['*.min.js', 'fixtures/'],
    skipFiles: [],
    skipCommon: false,
    ignoreFile: '.gitignore',
    maxFileSize: 1_000_000,

    // Misc
    verbose: false,
};
