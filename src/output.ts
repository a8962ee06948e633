/**
 * Output helpers: where a snapshot goes and whether it may overwrite.
 */

import { accessSync, constants, existsSync, statSync, writeFileSync } from 'fs';
import { basename, dirname, resolve } from 'path';
import { confirm } from '@inquirer/prompts';
import clipboard from 'clipboardy';

/** Asks the user a yes/no question */
export type ConfirmFn = (message: string) => Promise<boolean>;

/** "<project>_source.md" in the current directory */
export function defaultOutputName(projectPath: string): string {
    return `${basename(resolve(projectPath))}_source.md`;
}

export const promptConfirm: ConfirmFn = (message) => confirm({ message, default: false });

/**
 * True when the snapshot may be written: no file there yet, --force, or the
 * user agreed.
 */
export async function confirmOverwrite(outputPath: string, force: boolean, ask: ConfirmFn = promptConfirm): Promise<boolean> {
    if (force || !existsSync(outputPath)) return true;
    return ask(`File ${outputPath} already exists. Overwrite?`);
}

/**
 * Throws when the output file cannot be written, so the run aborts before traversal.
 */
export function assertWritable(outputPath: string): void {
    const abs = resolve(outputPath);
    const dir = dirname(abs);

    if (!existsSync(dir) || !statSync(dir).isDirectory()) {
        throw new Error(`Output directory does not exist: ${dir}`);
    }

    if (existsSync(abs) && statSync(abs).isDirectory()) {
        throw new Error(`Output path is a directory: ${abs}`);
    }

    try {
        accessSync(existsSync(abs) ? abs : dir, constants.W_OK);
    } catch {
        throw new Error(`Output path is not writable: ${abs}`);
    }
}

export function writeDocument(outputPath: string, markdown: string): string {
    const abs = resolve(outputPath);
    writeFileSync(abs, markdown, 'utf-8');
    return abs;
}

export async function copyToClipboard(text: string): Promise<void> {
    await clipboard.write(text);
}
