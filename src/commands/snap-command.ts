import { resolve } from 'path';
import { buildSnapshot, validateProjectRoot, type Snapshot } from '../snapshot/index.js';
import {
  assertWritable,
  confirmOverwrite,
  defaultOutputName,
  promptConfirm,
  writeDocument,
  type ConfirmFn,
} from '../output.js';
import { toSnapshotOptions, type SelectionOptions } from './selection.js';

export interface SnapCommandOptions extends SelectionOptions {
  /** Output file (default: <project>_source.md in the CWD) */
  output?: string;
  force: boolean;
  tokens: boolean;
}

export type SnapCommandResult =
  | { status: 'cancelled'; outputPath: string }
  | { status: 'written'; outputPath: string; snapshot: Snapshot };

/**
 * Write a snapshot of options.path to a markdown file.
 * Configuration problems throw before any traversal; a declined overwrite
 * returns "cancelled" without touching the file. `onConfirmed` runs once the
 * write is settled, right before traversal starts.
 */
export async function runSnapCommand(
  options: SnapCommandOptions,
  ask: ConfirmFn = promptConfirm,
  onConfirmed?: (outputPath: string) => void
): Promise<SnapCommandResult> {
  const outputPath = resolve(options.output ?? defaultOutputName(options.path));

  validateProjectRoot(options.path);
  assertWritable(outputPath);

  if (!(await confirmOverwrite(outputPath, options.force, ask))) {
    return { status: 'cancelled', outputPath };
  }

  onConfirmed?.(outputPath);

  const snapshot = buildSnapshot(options.path, {
    ...toSnapshotOptions(options),
    outputPath,
    tokenEstimate: options.tokens,
  });

  writeDocument(outputPath, snapshot.markdown);
  return { status: 'written', outputPath, snapshot };
}
