/**
 * Depth-first walk that feeds every kept text file to an output sink
 */

import { readdirSync, readFileSync, statSync, existsSync, realpathSync } from 'fs';
import type { Dirent } from 'fs';
import path from 'path';
import {
  checkIgnore,
  composeChildRuleSet,
  createRootRuleSet,
  DEFAULT_IGNORE_FILE_NAME,
} from '../ignore-handling/index.js';
import type { RuleSet } from '../ignore-handling/types.js';
import { isBinaryFile } from './binary-detector.js';
import type { CombineOptions, CombineResult, OutputSink } from './types.js';

/**
 * Default combine options
 */
export const DEFAULT_OPTIONS: Required<Omit<CombineOptions, 'signal'>> = {
  outputFile: 'combined.txt',
  ignoreFileName: DEFAULT_IGNORE_FILE_NAME,
  additionalPatterns: [],
  useDefaults: true,
  sort: false,
  dryRun: false,
  verbose: false,
};

interface WalkContext {
  opts: Required<Omit<CombineOptions, 'signal'>> & Pick<CombineOptions, 'signal'>;
  displayRoot: string;
  outputPath: string;
  /** Real paths of every directory entered so far */
  visited: Set<string>;
  sink?: OutputSink;
  result: CombineResult;
}

type EntryKind = 'directory' | 'file';

/**
 * Header line written before each file's contents
 * @param displayPath Path shown for the file
 */
export function formatFileHeader(displayPath: string): string {
  return `# File: ${displayPath}\n\n`;
}

/**
 * Walk `rootDir` and write every non-ignored, non-binary file into `sink`
 *
 * Entries named like the ignore file and the output file itself are never visited.
 * An ignored directory is pruned: nothing below it is examined, even if a deeper
 * rule would re-include one of its children. Symbolic links are followed, but each
 * directory is entered at most once, so a link back to an ancestor ends the descent.
 *
 * @param rootDir Directory to walk (must exist)
 * @param sink Output destination; when omitted nothing is written
 * @param options Combine options
 * @returns Summary of what was included, skipped and failed
 */
export function writeTree(
  rootDir: string,
  sink: OutputSink | undefined,
  options: CombineOptions = {}
): CombineResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const ruleSet = createRootRuleSet(rootDir, opts);
  const outputPath = canonicalPath(opts.outputFile);

  const context: WalkContext = {
    opts,
    displayRoot: rootDir,
    outputPath,
    visited: new Set([ruleSet.root]),
    sink,
    result: {
      outputFile: outputPath,
      filesIncluded: [],
      skippedBinary: [],
      ignored: [],
      errors: [],
    },
  };

  if (opts.verbose) {
    console.log(`Loaded ${ruleSet.rules.length} ignore rules for ${ruleSet.root}`);
  }

  walkDirectory('', ruleSet, context);
  return context.result;
}

/**
 * Real path of a file that may not exist yet, so it compares equal to walked entries
 */
function canonicalPath(filePath: string): string {
  const resolved = path.resolve(filePath);
  if (existsSync(resolved)) {
    return realpathSync(resolved);
  }
  const dir = path.dirname(resolved);
  return existsSync(dir) ? path.join(realpathSync(dir), path.basename(resolved)) : resolved;
}

function reportError(context: WalkContext, message: string): void {
  console.error(message);
  context.result.errors.push(message);
}

/**
 * Recursively visit one directory with the rules in effect for its entries
 * @param relativeDir Directory path relative to the root ('' for the root itself)
 * @param ruleSet RuleSet for this directory's entries
 * @param context Walk state shared by the whole traversal
 */
function walkDirectory(relativeDir: string, ruleSet: RuleSet, context: WalkContext): void {
  const { opts } = context;
  const absoluteDir = path.join(ruleSet.root, relativeDir);

  let entries: Dirent[];
  try {
    entries = readdirSync(absoluteDir, { withFileTypes: true });
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    reportError(
      context,
      `Could not read directory ${path.join(context.displayRoot, relativeDir)}: ${errorMessage}`
    );
    return;
  }

  if (opts.sort) {
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  for (const entry of entries) {
    opts.signal?.throwIfAborted();

    if (entry.name === opts.ignoreFileName) {
      continue;
    }

    const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
    const absolutePath = path.join(absoluteDir, entry.name);
    const kind = resolveEntryKind(entry, absolutePath, relativePath, context);
    if (!kind) {
      continue;
    }

    const realPath = resolveRealPath(absolutePath, relativePath, context);
    if (!realPath || (kind === 'file' && realPath === context.outputPath)) {
      continue;
    }

    const check = checkIgnore(ruleSet, relativePath, kind === 'directory');
    if (check.shouldIgnore) {
      context.result.ignored.push(relativePath);
      if (opts.verbose) {
        console.log(`Ignoring ${relativePath}: ${check.reason}`);
      }
      continue;
    }

    if (kind === 'directory') {
      if (context.visited.has(realPath)) {
        if (opts.verbose) {
          console.log(`Skipping already visited directory: ${relativePath}`);
        }
        continue;
      }
      context.visited.add(realPath);
      const childRules = composeChildRuleSet(ruleSet, relativePath, opts.ignoreFileName);
      walkDirectory(relativePath, childRules, context);
    } else {
      copyFile(absolutePath, relativePath, context);
    }
  }
}

/**
 * Classify an entry, following symbolic links
 * @returns The entry kind, or null for dangling links and special files
 */
function resolveEntryKind(
  entry: Dirent,
  absolutePath: string,
  relativePath: string,
  context: WalkContext
): EntryKind | null {
  if (entry.isDirectory()) {
    return 'directory';
  }
  if (entry.isFile()) {
    return 'file';
  }
  if (!entry.isSymbolicLink()) {
    return null;
  }

  try {
    const stats = statSync(absolutePath, { throwIfNoEntry: false });
    if (!stats) {
      if (context.opts.verbose) {
        console.log(`Skipping dangling link: ${relativePath}`);
      }
      return null;
    }
    return stats.isDirectory() ? 'directory' : stats.isFile() ? 'file' : null;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    reportError(
      context,
      `Could not stat ${path.join(context.displayRoot, relativePath)}: ${errorMessage}`
    );
    return null;
  }
}

/**
 * Resolve every symbolic link on the way to an entry
 * @returns The real path, or null if it cannot be resolved
 */
function resolveRealPath(
  absolutePath: string,
  relativePath: string,
  context: WalkContext
): string | null {
  try {
    return realpathSync(absolutePath);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    reportError(
      context,
      `Could not resolve ${path.join(context.displayRoot, relativePath)}: ${errorMessage}`
    );
    return null;
  }
}

/**
 * Append one file to the output unless it looks binary
 * The header is written only once the contents have been read.
 */
function copyFile(absolutePath: string, relativePath: string, context: WalkContext): void {
  const displayPath = path.join(context.displayRoot, relativePath);
  let content: Buffer;

  try {
    if (isBinaryFile(absolutePath)) {
      context.result.skippedBinary.push(relativePath);
      if (context.opts.verbose) {
        console.log(`Skipping binary file: ${relativePath}`);
      }
      return;
    }
    content = readFileSync(absolutePath);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    reportError(context, `Failed to open file: ${displayPath}: ${errorMessage}`);
    return;
  }

  if (context.sink) {
    context.sink.write(formatFileHeader(displayPath));
    context.sink.write(content);
    context.sink.write('\n\n');
  }

  context.result.filesIncluded.push(relativePath);
  if (context.opts.verbose) {
    console.log(`Added ${relativePath} (${content.length} bytes)`);
  }
}
