#!/usr/bin/env node

import { parseArgs } from 'node:util';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { combineDirectory } from '../api.js';
import { DEFAULT_OPTIONS } from '../file-processing/index.js';
import type { CombineResult } from '../file-processing/types.js';

/**
 * CLI interface for tree-combiner
 */

export interface CLIOptions {
  directory?: string;
  output: string;
  ignoreFile: string;
  exclude: string[];
  useDefaults: boolean;
  sort: boolean;
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export const USAGE = 'Usage: tree-combiner <directory_path> [options]';

const HELP_TEXT = `
tree-combiner - Combine the text files of a directory tree into one file

USAGE:
  tree-combiner <directory> [options]

ARGUMENTS:
  directory                 Directory to combine

OPTIONS:
  --output, -o <path>       Output file (default: ${DEFAULT_OPTIONS.outputFile})
  --ignore-file, -i <name>  Per-directory ignore file name (default: ${DEFAULT_OPTIONS.ignoreFileName})
  --exclude, -e <pattern>   Extra ignore pattern, may be repeated
  --no-defaults             Don't skip .git directories
  --sort, -s                Visit entries in name order
  --dry-run, -d             List the files that would be combined without writing
  --verbose, -v             Show detailed output
  --help, -h                Show this help message
  --version, -V             Show version number

EXAMPLES:
  tree-combiner ./project
  tree-combiner ./project --output project.txt --sort
  tree-combiner ./project -e "*.lock" -e "fixtures/" --dry-run
`;

export const VERSION = '1.0.0';

/**
 * Parse command line arguments
 * @param args Arguments without the node executable and script path
 * @throws Error on unknown options or missing option values
 */
export function parseCliArgs(args: string[]): CLIOptions {
  const { values, positionals } = parseArgs({
    args,
    options: {
      output: {
        type: 'string',
        short: 'o',
      },
      'ignore-file': {
        type: 'string',
        short: 'i',
      },
      exclude: {
        type: 'string',
        short: 'e',
        multiple: true,
      },
      'no-defaults': {
        type: 'boolean',
        default: false,
      },
      sort: {
        type: 'boolean',
        short: 's',
        default: false,
      },
      'dry-run': {
        type: 'boolean',
        short: 'd',
        default: false,
      },
      verbose: {
        type: 'boolean',
        short: 'v',
        default: false,
      },
      help: {
        type: 'boolean',
        short: 'h',
        default: false,
      },
      version: {
        type: 'boolean',
        short: 'V',
        default: false,
      },
    },
    allowPositionals: true,
  });

  return {
    directory: positionals[0],
    output: values.output || DEFAULT_OPTIONS.outputFile,
    ignoreFile: values['ignore-file'] || DEFAULT_OPTIONS.ignoreFileName,
    exclude: values.exclude || [],
    useDefaults: !values['no-defaults'],
    sort: values.sort || false,
    dryRun: values['dry-run'] || false,
    verbose: values.verbose || false,
    help: values.help || false,
    version: values.version || false,
  };
}

/**
 * Display combine results
 */
function displayResults(result: CombineResult, options: CLIOptions): void {
  if (options.dryRun) {
    console.log('Files that would be combined:');
    for (const file of result.filesIncluded) {
      console.log(`  ${file}`);
    }
    console.log('\n(Dry run mode - no output file was written)');
  } else {
    console.log(`Files have been combined into ${options.output}`);
  }

  console.log('\n=== Summary ===');
  console.log(`Files combined: ${result.filesIncluded.length}`);
  console.log(`Binary files skipped: ${result.skippedBinary.length}`);
  console.log(`Entries ignored: ${result.ignored.length}`);

  if (result.errors.length > 0) {
    console.log(`Errors: ${result.errors.length}`);
  }

  if (options.verbose) {
    console.log('\n=== Detailed Results ===');
    for (const file of result.skippedBinary) {
      console.log(`  binary:  ${file}`);
    }
    for (const entry of result.ignored) {
      console.log(`  ignored: ${entry}`);
    }
  }
}

/**
 * Run the CLI
 * @param args Arguments without the node executable and script path
 * @returns Process exit code
 */
export function runCli(args: string[]): number {
  let options: CLIOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    console.error(
      'Error parsing arguments:',
      error instanceof Error ? error.message : 'Unknown error'
    );
    return 1;
  }

  if (options.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (options.version) {
    console.log(VERSION);
    return 0;
  }

  if (!options.directory) {
    console.error(USAGE);
    return 1;
  }

  if (options.verbose) {
    console.log('CLI Options:', options);
  }

  try {
    const result = combineDirectory(options.directory, {
      outputFile: options.output,
      ignoreFileName: options.ignoreFile,
      additionalPatterns: options.exclude,
      useDefaults: options.useDefaults,
      sort: options.sort,
      dryRun: options.dryRun,
      verbose: options.verbose,
    });
    displayResults(result, options);
    return 0;
  } catch (error) {
    console.error(error instanceof Error ? error.message : 'Unknown error');
    return 1;
  }
}

function isMainModule(): boolean {
  const script = process.argv[1];
  return Boolean(script) && fs.existsSync(script) && fs.realpathSync(script) === fileURLToPath(import.meta.url);
}

if (isMainModule()) {
  process.exitCode = runCli(process.argv.slice(2));
}
