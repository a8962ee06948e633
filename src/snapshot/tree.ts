/**
 * Directory Tree Renderer - the "Project Structure" listing of a snapshot.
 * Filters files and directories through the same matcher as the content pass.
 */

import { listPaths, type WalkEntry } from './walk.js';
import type { PatternMatcher } from './patterns.js';

export const TREE_INDENT = '│   ';
export const TREE_BRANCH = '├── ';

/**
 * Render every non-excluded path under root, one per line, after a "." root line.
 * Entries are interleaved in path order; directories end with "/".
 */
export function renderTree(root: string, matcher: PatternMatcher): string {
  const lines = ['.'];

  for (const entry of listPaths(root)) {
    if (matcher.isExcluded(entry.relativePath)) continue;
    lines.push(formatTreeLine(entry));
  }

  return lines.join('\n');
}

export function formatTreeLine(entry: Pick<WalkEntry, 'name' | 'depth' | 'isDirectory'>): string {
  const prefix = entry.depth > 0 ? `${TREE_INDENT.repeat(entry.depth - 1)}${TREE_BRANCH}` : '';
  return `${prefix}${entry.name}${entry.isDirectory ? '/' : ''}`;
}
