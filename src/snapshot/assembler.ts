/**
 * Snapshot Assembler - Full pipeline:
 *
 * 1. Validate the project root
 * 2. Build the pattern matcher (defaults + extra excludes + .gitignore)
 * 3. Render the tree through the matcher
 * 4. Walk files in path order: ignore, classify, read
 * 5. Join sections into the markdown document
 * 6. Optionally append token estimates
 *
 * Nothing under the project root is ever written. Statistics are returned
 * alongside the document, never embedded in it.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { resolve } from 'path';
import { createPatternMatcher, type PatternMatcherOptions } from './patterns.js';
import { classifyFile, detectLanguage, DEFAULT_MAX_FILE_SIZE } from './classifier.js';
import { renderTree } from './tree.js';
import { listPaths, type WalkEntry } from './walk.js';
import { estimateTokens, formatCount, type TokenCounter, type TokenReport } from '../tokens/estimator.js';

export const DOCUMENT_TITLE = '# Project Source Code\n';
export const STRUCTURE_HEADING = '## Project Structure';
export const TOKEN_HEADING = '\n## Token Estimates\n';
export const BINARY_PLACEHOLDER = '*[Binary file]*\n';

export interface SnapshotOptions extends PatternMatcherOptions {
  /** Files above this size are treated as binary (default: 1,000,000 bytes) */
  maxFileSize?: number;
  /** Append a "Token Estimates" section (default: false) */
  tokenEstimate?: boolean;
  /** Counter used for token estimates (default: cl100k_base) */
  tokenCounter?: TokenCounter;
}

export interface SnapshotStats {
  totalFiles: number;
  includedFiles: number;
  binaryFiles: number;
  ignoredFiles: number;
  /** Text files dropped because the full read failed */
  skippedFiles: number;
  /** Characters of included text */
  totalSize: number;
  languages: Set<string>;
  skipped: { path: string; reason: string }[];
}

export interface Snapshot {
  /** The final markdown document */
  markdown: string;
  /** Document sections in order; joined with "\n" they form `markdown` */
  sections: string[];
  /** The tree listing (unfenced) */
  tree: string;
  stats: SnapshotStats;
  /** Present when token estimation was requested; {} means no estimate */
  tokens?: TokenReport;
}

interface SnapshotRun {
  tree: string;
  stats: SnapshotStats;
  /** Lazily produced sections; stats fill in as they are consumed */
  sections: Generator<string>;
}

export function createStats(): SnapshotStats {
  return {
    totalFiles: 0,
    includedFiles: 0,
    binaryFiles: 0,
    ignoredFiles: 0,
    skippedFiles: 0,
    totalSize: 0,
    languages: new Set<string>(),
    skipped: [],
  };
}

/**
 * Resolve and check the project root. Throws before any traversal.
 */
export function validateProjectRoot(root: string): string {
  const abs = resolve(root);

  if (!existsSync(abs)) {
    throw new Error(`Path does not exist: ${root}\nResolved to: ${abs}`);
  }

  if (!statSync(abs).isDirectory()) {
    throw new Error(`Path is not a directory: ${root}\nResolved to: ${abs}`);
  }

  return abs;
}

/**
 * Build the complete snapshot document.
 */
export function buildSnapshot(root: string, options: SnapshotOptions = {}): Snapshot {
  const run = startSnapshot(root, options);
  const sections = [...run.sections];
  let markdown = sections.join('\n');
  let tokens: TokenReport | undefined;

  if (options.tokenEstimate) {
    tokens = estimateTokens(markdown, options.tokenCounter);
    if (Object.keys(tokens).length > 0) {
      sections.push(...renderTokenSection(tokens));
      markdown = sections.join('\n');
    }
  }

  if (options.verbose) {
    const { stats } = run;
    console.log(`  Scanned ${stats.totalFiles} files: ${stats.includedFiles} included, ${stats.binaryFiles} binary, ${stats.ignoredFiles} ignored, ${stats.skippedFiles} skipped`);
  }

  return { markdown, sections, tree: run.tree, stats: run.stats, tokens };
}

/**
 * Stream the document chunk by chunk. The chunks concatenate to the same
 * text as buildSnapshot() without token estimates; the generator returns
 * the final statistics.
 */
export function* streamSnapshot(root: string, options: SnapshotOptions = {}): Generator<string, SnapshotStats, undefined> {
  const run = startSnapshot(root, options);
  let first = true;

  for (const section of run.sections) {
    yield first ? section : `\n${section}`;
    first = false;
  }

  return run.stats;
}

export function renderTokenSection(tokens: TokenReport): string[] {
  return [
    TOKEN_HEADING,
    ...Object.entries(tokens).map(([model, count]) => `- ${model}: ~${formatCount(count)} tokens`),
  ];
}

/** Console summary lines for a finished run */
export function formatStats(stats: SnapshotStats): string[] {
  return [
    'Project Statistics:',
    `  • Total files scanned: ${stats.totalFiles}`,
    `  • Files included: ${stats.includedFiles}`,
    `  • Binary files: ${stats.binaryFiles}`,
    `  • Ignored files: ${stats.ignoredFiles}`,
    ...(stats.skippedFiles > 0 ? [`  • Skipped files: ${stats.skippedFiles}`] : []),
    `  • Total size: ${(stats.totalSize / 1024).toFixed(1)}KB`,
    `  • Languages: ${[...stats.languages].sort().join(', ')}`,
  ];
}

/**
 * Validation, matcher and tree happen eagerly so configuration errors
 * surface before the first section is produced.
 */
function startSnapshot(root: string, options: SnapshotOptions): SnapshotRun {
  const rootPath = validateProjectRoot(root);
  const matcher = createPatternMatcher(rootPath, options);
  const tree = renderTree(rootPath, matcher);
  const stats = createStats();
  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;

  function* sections(): Generator<string> {
    yield DOCUMENT_TITLE;
    yield STRUCTURE_HEADING;
    yield `\`\`\`\n${tree}\n\`\`\``;
    yield '';

    for (const entry of listPaths(rootPath)) {
      if (entry.isDirectory) continue;

      stats.totalFiles++;
      if (matcher.isExcluded(entry.relativePath)) {
        stats.ignoredFiles++;
        continue;
      }

      const section = renderFileSection(entry, maxFileSize, stats);
      if (section !== null) yield section;
    }
  }

  return { tree, stats, sections: sections() };
}

function renderFileSection(entry: WalkEntry, maxFileSize: number, stats: SnapshotStats): string | null {
  const heading = `\n## ${entry.relativePath}\n`;

  if (classifyFile(entry.absolutePath, maxFileSize) === 'binary') {
    stats.binaryFiles++;
    return [heading, BINARY_PLACEHOLDER].join('\n');
  }

  let content: string;
  try {
    content = new TextDecoder('utf-8', { fatal: true }).decode(readFileSync(entry.absolutePath));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`Warning: Skipping ${entry.relativePath}: ${reason}`);
    stats.skippedFiles++;
    stats.skipped.push({ path: entry.relativePath, reason });
    return null;
  }

  const language = detectLanguage(entry.relativePath);
  stats.includedFiles++;
  stats.totalSize += content.length;
  if (language) stats.languages.add(language);

  return [heading, `\`\`\`${language ?? ''}`, content, '```\n'].join('\n');
}
