/**
 * Shell completion scripts, shipped as static files in completions/.
 */

import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';

export const SUPPORTED_SHELLS = ['bash', 'zsh', 'fish'] as const;

export type Shell = (typeof SUPPORTED_SHELLS)[number];

export function completionPath(shell: Shell): string {
    return fileURLToPath(new URL(`../completions/codepaste.${shell}`, import.meta.url));
}

/** Script text, or null when the asset is missing */
export function getCompletionScript(shell: Shell): string | null {
    const file = completionPath(shell);
    if (!existsSync(file)) return null;
    return readFileSync(file, 'utf-8');
}
