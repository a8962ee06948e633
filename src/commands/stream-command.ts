import { streamSnapshot, buildSnapshot, type SnapshotStats } from '../snapshot/index.js';
import { copyToClipboard } from '../output.js';
import { toSnapshotOptions, type SelectionOptions } from './selection.js';

/**
 * Stream the snapshot through `write`, chunk by chunk.
 * Nothing is written when the project root is invalid.
 */
export function runStreamCommand(options: SelectionOptions, write: (chunk: string) => void): SnapshotStats {
  const stream = streamSnapshot(options.path, toSnapshotOptions(options));

  let next = stream.next();
  while (!next.done) {
    write(next.value);
    next = stream.next();
  }

  return next.value;
}

/**
 * Build the snapshot and hand it to the clipboard.
 */
export async function runCopyCommand(
  options: SelectionOptions,
  copy: (text: string) => Promise<void> = copyToClipboard
): Promise<SnapshotStats> {
  const snapshot = buildSnapshot(options.path, toSnapshotOptions(options));
  await copy(snapshot.markdown);
  return snapshot.stats;
}
