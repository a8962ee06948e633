import type { SnapshotOptions } from '../snapshot/index.js';

/** File-selection flags shared by the snap, stream and default commands */
export interface SelectionOptions {
  path: string;
  maxFileSize: number;
  skipCommon: boolean;
  skipFiles: string[];
  exclude: string[];
  ignoreFile?: string;
  verbose: boolean;
}

export function toSnapshotOptions(options: SelectionOptions): SnapshotOptions {
  return {
    maxFileSize: options.maxFileSize,
    skipCommon: options.skipCommon,
    skipFiles: options.skipFiles,
    exclude: options.exclude,
    ignoreFile: options.ignoreFile,
    verbose: options.verbose,
  };
}
