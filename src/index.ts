/**
 * Tree Combiner - Concatenate the text files of a directory tree into one file
 *
 * This package walks a directory depth-first and writes every readable text file
 * into a single output, each preceded by a `# File: <path>` header. Nested
 * `.gitignore` files are honored with last-match-wins precedence, ignored
 * directories are never entered, and files that look binary are skipped.
 *
 * @example Basic Usage
 * ```typescript
 * import { combineDirectory } from 'tree-combiner';
 *
 * const result = combineDirectory('./project', { outputFile: 'project.txt' });
 * console.log(`${result.filesIncluded.length} files combined`);
 * ```
 *
 * @example Using the ignore engine directly
 * ```typescript
 * import { createRuleSet, isIgnored } from 'tree-combiner';
 *
 * const rules = createRuleSet(['*.log', '!important.log', 'build/']);
 *
 * isIgnored(rules, 'debug.log', false);     // true
 * isIgnored(rules, 'important.log', false); // false
 * isIgnored(rules, 'src/build', true);      // true
 * ```
 *
 * @example Writing into a custom sink
 * ```typescript
 * import { writeTree } from 'tree-combiner';
 *
 * const chunks: string[] = [];
 * writeTree('./project', {
 *   write: chunk => chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString()),
 *   close: () => {},
 * }, { sort: true });
 * ```
 *
 * @packageDocumentation
 */

export * from './api.js';
export * from './file-processing/index.js';
export * from './ignore-handling/index.js';
