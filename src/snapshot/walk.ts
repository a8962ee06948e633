/**
 * Directory Walker - enumerates every file and directory under a root.
 * Symlinked directories are listed but not followed.
 */

import { readdirSync, statSync, type Dirent } from 'fs';
import { join } from 'path';

export interface WalkEntry {
    /** Path relative to the root, forward-slash separated */
    relativePath: string;
    absolutePath: string;
    /** Last path segment */
    name: string;
    /** 0 for direct children of the root */
    depth: number;
    isDirectory: boolean;
}

/**
 * List every descendant of root, sorted by path components so both
 * snapshot passes see the same order on every run.
 */
export function listPaths(root: string): WalkEntry[] {
    const entries: WalkEntry[] = [];
    walkDir(root, '', 0, entries);
    return entries.sort((a, b) => comparePaths(a.relativePath, b.relativePath));
}

/** Component-wise, code-unit comparison (locale independent) */
export function comparePaths(a: string, b: string): number {
    const left = a.split('/');
    const right = b.split('/');
    const shared = Math.min(left.length, right.length);

    for (let i = 0; i < shared; i++) {
        if (left[i] < right[i]) return -1;
        if (left[i] > right[i]) return 1;
    }

    return left.length - right.length;
}

function walkDir(currentPath: string, relativeDir: string, depth: number, out: WalkEntry[]): void {
    let dirents: Dirent[];
    try {
        dirents = readdirSync(currentPath, { withFileTypes: true });
    } catch (error) {
        console.warn(`Warning: Cannot read directory ${relativeDir || '.'}: ${error instanceof Error ? error.message : error}`);
        return;
    }

    for (const dirent of dirents) {
        const absolutePath = join(currentPath, dirent.name);
        const relativePath = relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name;

        let isDirectory = dirent.isDirectory();
        if (dirent.isSymbolicLink()) {
            try {
                isDirectory = statSync(absolutePath).isDirectory();
            } catch {
                // Dangling link
                continue;
            }
        } else if (!isDirectory && !dirent.isFile()) {
            continue;
        }

        out.push({ relativePath, absolutePath, name: dirent.name, depth, isDirectory });

        if (isDirectory && !dirent.isSymbolicLink()) {
            walkDir(absolutePath, relativePath, depth + 1, out);
        }
    }
}
