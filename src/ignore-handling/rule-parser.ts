import { readFileSync, existsSync } from 'fs';
import path from 'path';
import type { IgnoreRule } from './types.js';

/**
 * Parse one line of an ignore file
 *
 * Blank lines and lines starting with `#` produce no rule. Every other line is
 * read best-effort: anything that is not a supported wildcard is taken literally.
 *
 * @example
 * ```typescript
 * parseIgnoreLine('!/build/');
 * // { pattern: 'build', segments: ['build'], negate: true,
 * //   directoryOnly: true, anchored: true, source: '!/build/' }
 * ```
 *
 * @param line Raw line text
 * @param base Absolute directory the line was read from, if any
 * @returns The parsed rule, or null when the line defines none
 */
export function parseIgnoreLine(line: string, base?: string): IgnoreRule | null {
  const source = line.trim();
  if (!source || source.startsWith('#')) {
    return null;
  }

  let pattern = source;
  let negate = false;
  let directoryOnly = false;
  let anchored = false;

  if (pattern.startsWith('!')) {
    negate = true;
    pattern = pattern.slice(1).trim();
  }

  if (pattern.endsWith('/')) {
    directoryOnly = true;
    pattern = pattern.slice(0, -1);
  }

  if (pattern.startsWith('/')) {
    anchored = true;
    pattern = pattern.slice(1);
  }

  // "a//b" is read as "a/b"
  const segments = pattern.split('/').filter(segment => segment !== '');
  if (segments.length === 0) {
    return null;
  }

  const rule: IgnoreRule = { pattern, segments, negate, directoryOnly, anchored, source };
  return base === undefined ? rule : { ...rule, base };
}

/**
 * Parse the full text of an ignore file, keeping line order
 * @param content File contents
 * @param base Absolute directory the contents were read from, if any
 * @returns Rules in file order
 */
export function parseIgnoreContent(content: string, base?: string): IgnoreRule[] {
  const rules: IgnoreRule[] = [];
  for (const line of content.split(/\r?\n/)) {
    const rule = parseIgnoreLine(line, base);
    if (rule) {
      rules.push(rule);
    }
  }
  return rules;
}

/**
 * Read and parse an ignore file. Its rules are anchored at the file's directory.
 * A missing or unreadable file contributes no rules.
 * @param ignoreFilePath Path to the ignore file
 * @returns Rules in file order
 */
export function parseIgnoreFile(ignoreFilePath: string): IgnoreRule[] {
  if (!existsSync(ignoreFilePath)) {
    return [];
  }

  try {
    const content = readFileSync(ignoreFilePath, 'utf-8');
    return parseIgnoreContent(content, path.dirname(path.resolve(ignoreFilePath)));
  } catch (error) {
    console.warn(`Warning: Could not read ignore file ${ignoreFilePath}:`, error);
    return [];
  }
}
