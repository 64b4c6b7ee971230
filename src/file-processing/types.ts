/**
 * Core types for walking a tree and combining its files
 */

import type { IgnoreOptions } from '../ignore-handling/types.js';

/**
 * Options for controlling how a directory tree is combined
 */
export interface CombineOptions extends IgnoreOptions {
  /** Output file path, resolved against the cwd (defaults to combined.txt) */
  outputFile?: string;
  /** If true, visit directory entries in name order instead of filesystem order */
  sort?: boolean;
  /** If true, don't write the output file, just report what would be combined */
  dryRun?: boolean;
  /** If true, provide detailed output about each decision */
  verbose?: boolean;
  /** Checked once per visited entry; aborting stops the walk */
  signal?: AbortSignal;
}

/**
 * Destination of the combined output
 */
export interface OutputSink {
  write(chunk: string | Uint8Array): void;
  close(): void;
}

/**
 * Result of combining a directory tree
 * Paths are relative to the scan root and use `/` separators.
 */
export interface CombineResult {
  /** Absolute path of the output file */
  outputFile: string;
  /** Files whose contents were combined (or would be, in dry run mode) */
  filesIncluded: string[];
  /** Files skipped because they look binary */
  skippedBinary: string[];
  /** Files and directories excluded by ignore rules */
  ignored: string[];
  /** Per-entry errors encountered during the walk */
  errors: string[];
}
