#!/usr/bin/env node

/**
 * codepaste CLI
 *
 * Turn a project directory into one markdown document for AI assistants.
 */

import { Argument, Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { formatStats } from './snapshot/index.js';
import { loadConfig, CONFIG_TEMPLATE, DEFAULT_CONFIG_FILE, type CliConfig } from './config.js';
import { runSnapCommand } from './commands/snap-command.js';
import { runStreamCommand, runCopyCommand } from './commands/stream-command.js';
import { runTokensCommand, formatTokensReport } from './commands/tokens-command.js';
import type { SelectionOptions } from './commands/selection.js';
import { getCompletionScript, SUPPORTED_SHELLS, type Shell } from './completions.js';
import { DEFAULT_MAX_FILE_SIZE } from './snapshot/classifier.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

interface SelectionFlags {
    path: string;
    maxFileSize: string;
    skipCommon?: boolean;
    skipFiles: string[];
    exclude: string[];
    configPath?: string;
    verbose?: boolean;
}

interface SnapFlags extends SelectionFlags {
    output?: string;
    summary: boolean;
    force?: boolean;
    tokens?: boolean;
}

const program = new Command();

function collect(value: string, previous: string[]): string[] {
    return previous.concat([value]);
}

function parsePositiveInt(value: string, flag: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new Error(`${flag} must be a positive integer, got "${value}"`);
    }
    return parsed;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** Shared selection flags for snap, stream and the default command */
function withSelectionOptions(command: Command): Command {
    return command
        .option('-p, --path <dir>', 'Path to the project directory', '.')
        .option('--max-file-size <bytes>', 'Maximum file size in bytes', String(DEFAULT_MAX_FILE_SIZE))
        .option('--skip-common', 'Skip commonly referenced files (LICENSE, CONTRIBUTING, etc.)')
        .option('--skip-files <glob>', 'Filename pattern to skip (can be used multiple times)', collect, [])
        .option('--exclude <pattern>', 'Extra ignore pattern (can be used multiple times)', collect, [])
        .option('--config-path <path>', `Path to config JSON file (e.g. ${DEFAULT_CONFIG_FILE})`)
        .option('--verbose', 'Verbose output');
}

/**
 * Merge flags with the config file.
 * Priority: CLI flags > config file > hardcoded defaults
 */
function resolveSelection(flags: SelectionFlags, command: Command, config: CliConfig): SelectionOptions {
    const fromCli = (name: string) => command.getOptionValueSource(name) === 'cli';

    return {
        path: flags.path,
        maxFileSize: config.maxFileSize !== undefined && !fromCli('maxFileSize')
            ? config.maxFileSize
            : parsePositiveInt(flags.maxFileSize, '--max-file-size'),
        skipCommon: config.skipCommon !== undefined && !fromCli('skipCommon') ? config.skipCommon : Boolean(flags.skipCommon),
        skipFiles: config.skipFiles !== undefined && !fromCli('skipFiles') ? config.skipFiles : flags.skipFiles,
        exclude: config.exclude !== undefined && !fromCli('exclude') ? config.exclude : flags.exclude,
        ignoreFile: config.ignoreFile,
        verbose: config.verbose !== undefined && !fromCli('verbose') ? config.verbose : Boolean(flags.verbose),
    };
}

function readConfig(flags: SelectionFlags): CliConfig {
    if (!flags.configPath) return {};
    const config = loadConfig(flags.configPath);
    if (config.verbose || flags.verbose) {
        console.error(`📄 Config loaded from: ${resolve(flags.configPath)}`);
    }
    return config;
}

program
    .name('codepaste')
    .description('Format your code for AI tools: snapshot a project into one markdown document')
    .version(pkg.version)
    // Subcommands share flag names with the default action
    .enablePositionalOptions();

/**
 * Default action - copy the snapshot to the clipboard
 */
withSelectionOptions(program)
    .action(async (flags: SelectionFlags, command: Command) => {
        try {
            const selection = resolveSelection(flags, command, readConfig(flags));
            const stats = await runCopyCommand(selection);
            console.error(`✓ Project snapshot copied to clipboard! (${stats.includedFiles} files)`);
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

/**
 * Snap command - write the snapshot to a file
 */
withSelectionOptions(
    program
        .command('snap')
        .description('Create a markdown snapshot of your project for AI models')
)
    .option('-o, --output <file>', 'Output markdown file (default: <project_dir>_source.md)')
    .option('--no-summary', 'Hide project stats in terminal output')
    .option('-f, --force', 'Force overwrite existing output file')
    .option('--tokens', 'Append token estimates to the document')
    .action(async (flags: SnapFlags, command: Command) => {
        try {
            const config = readConfig(flags);
            const src = (name: string) => command.getOptionValueSource(name);
            const selection = resolveSelection(flags, command, config);

            const output = config.output !== undefined && src('output') !== 'cli' ? config.output : flags.output;
            const summary = config.summary !== undefined && src('summary') !== 'cli' ? config.summary : flags.summary;
            const force = config.force !== undefined && src('force') !== 'cli' ? config.force : Boolean(flags.force);
            const tokens = config.tokens !== undefined && src('tokens') !== 'cli' ? config.tokens : Boolean(flags.tokens);

            const result = await runSnapCommand({ ...selection, output, force, tokens }, undefined, () => {
                console.log('📸 Creating project snapshot...');
            });

            if (result.status === 'cancelled') {
                console.log('Operation cancelled.');
                return;
            }

            if (summary) {
                console.log();
                formatStats(result.snapshot.stats).forEach(line => console.log(line));
                console.log();
            }
            console.log(`✨ Snapshot created at ${result.outputPath}`);
            console.log(`📦 Size: ${(Buffer.byteLength(result.snapshot.markdown, 'utf-8') / 1024).toFixed(1)}KB`);
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

/**
 * Stream command - write the snapshot to stdout for piping
 */
withSelectionOptions(
    program
        .command('stream')
        .description('Stream project snapshot to stdout for piping')
)
    .action((flags: SelectionFlags, command: Command) => {
        try {
            const selection = resolveSelection(flags, command, readConfig(flags));
            // stdout carries the document; verbose detail goes to stderr below
            const stats = runStreamCommand({ ...selection, verbose: false }, chunk => {
                process.stdout.write(chunk);
            });
            if (selection.verbose) {
                formatStats(stats).forEach(line => console.error(line));
            }
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

/**
 * Tokens command - token analysis of a snapshot file
 */
program
    .command('tokens')
    .description('Print a detailed token analysis of a project snapshot')
    .argument('[file]', 'Snapshot file (default: <current_dir>_source.md)')
    .action((file: string | undefined) => {
        try {
            const result = runTokensCommand(file);
            formatTokensReport(result).forEach(line => console.log(line));
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

/**
 * Completion command - print a shell completion script
 */
program
    .command('completion')
    .description('Generate shell completion script')
    .addArgument(new Argument('<shell>', 'Target shell').choices(SUPPORTED_SHELLS))
    .action((shell: Shell) => {
        const script = getCompletionScript(shell);
        if (script === null) {
            console.warn(`Warning: Completion script for ${shell} not available.`);
            return;
        }
        process.stdout.write(script);
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', DEFAULT_CONFIG_FILE)
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: codepaste snap --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

// Parse arguments and run
await program.parseAsync();
