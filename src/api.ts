import fs from 'fs';
import path from 'path';
import type { CombineOptions, CombineResult, OutputSink } from './file-processing/types.js';
import { createFileSink, DEFAULT_OPTIONS, writeTree } from './file-processing/index.js';

/**
 * Main API function for combining a directory tree into one file
 *
 * Walks `rootDir` depth-first, honoring the `.gitignore` files found in it and in
 * every directory above it, skips files that look binary, and writes each remaining
 * file as a `# File: <path>` header followed by its contents.
 *
 * @example
 * ```typescript
 * import { combineDirectory } from 'tree-combiner';
 *
 * // Combine ./src into ./combined.txt
 * const result = combineDirectory('./src');
 * console.log(`Combined ${result.filesIncluded.length} files`);
 *
 * // Preview with extra exclusions, in a stable order
 * const preview = combineDirectory('./src', {
 *   dryRun: true,
 *   sort: true,
 *   additionalPatterns: ['*.snap', 'fixtures/'],
 * });
 * ```
 *
 * @param rootDir Directory to combine
 * @param options Combine options
 * @returns Summary of included, skipped and failed entries
 * @throws Error if `rootDir` is not a directory or the output file cannot be created
 */
export function combineDirectory(rootDir: string, options: CombineOptions = {}): CombineResult {
  validateRoot(rootDir);

  const outputFile = options.outputFile || DEFAULT_OPTIONS.outputFile;
  if (options.dryRun) {
    return writeTree(rootDir, undefined, { ...options, outputFile });
  }

  let sink: OutputSink;
  try {
    sink = createFileSink(outputFile);
  } catch (error) {
    throw new Error(
      `Failed to create output file ${outputFile}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  try {
    return writeTree(rootDir, sink, { ...options, outputFile });
  } finally {
    sink.close();
  }
}

/**
 * Ensure the scan root exists and is a directory
 * @param rootDir Directory to check
 * @throws Error naming the directory otherwise
 */
export function validateRoot(rootDir: string): void {
  if (!rootDir || !rootDir.trim()) {
    throw new Error('Invalid directory: no directory given');
  }

  const stat = fs.statSync(path.resolve(rootDir), { throwIfNoEntry: false });
  if (!stat || !stat.isDirectory()) {
    throw new Error(`Invalid directory: ${rootDir}`);
  }
}
