export {
  buildSnapshot,
  streamSnapshot,
  validateProjectRoot,
  formatStats,
  renderTokenSection,
  createStats,
  DOCUMENT_TITLE,
  STRUCTURE_HEADING,
  TOKEN_HEADING,
  BINARY_PLACEHOLDER,
} from './assembler.js';
export type { Snapshot, SnapshotOptions, SnapshotStats } from './assembler.js';

// Ignore rules
export { createPatternMatcher, parseIgnoreFile, defaultIgnorePatterns, globToRegexSource, toPosixPath, canonicalPath, COMMON_FILES, DEFAULT_IGNORE_FILE } from './patterns.js';
export type { PatternMatcher, PatternMatcherOptions, ParsedIgnoreFile } from './patterns.js';

// Classification
export { classifyFile, detectLanguage, fileExtension, isBinaryExtension, looksLikeText, DEFAULT_MAX_FILE_SIZE, SNIFF_BYTES } from './classifier.js';
export type { Classification } from './classifier.js';

// Tree and traversal
export { renderTree, formatTreeLine } from './tree.js';
export { listPaths, comparePaths } from './walk.js';
export type { WalkEntry } from './walk.js';
