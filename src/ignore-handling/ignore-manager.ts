import { realpathSync } from 'fs';
import path from 'path';
import { parseIgnoreContent, parseIgnoreFile } from './rule-parser.js';
import { ruleMatches } from './pattern-matcher.js';
import type { IgnoreRule, RuleSet, IgnoreOptions, IgnoreCheckResult } from './types.js';

export const DEFAULT_IGNORE_FILE_NAME = '.gitignore';

export const DEFAULT_IGNORE_PATTERNS = ['.git/'];

/**
 * Creates a RuleSet from in-memory pattern lines
 * The rules have no base directory, so they match relative to `root`.
 * @param patterns Ignore-file lines (comments and blanks are skipped)
 * @param root Directory candidate paths are relative to (defaults to the cwd)
 * @returns RuleSet holding the parsed rules in order
 */
export function createRuleSet(patterns: string[], root: string = process.cwd()): RuleSet {
  return {
    root: path.resolve(root),
    rules: parseIgnoreContent(patterns.join('\n')),
  };
}

/**
 * Seeds the RuleSet for a scan root
 *
 * Rules are ordered defaults first, then the ignore files of every directory from the
 * filesystem root down to `rootDir`, then `additionalPatterns`. Ancestor ignore files
 * keep their own base directory, so a rule above the scan root still applies below it.
 *
 * @param rootDir Directory the scan starts at (must exist)
 * @param options Ignore options
 * @returns RuleSet rooted at the canonical `rootDir`
 */
export function createRootRuleSet(rootDir: string, options: IgnoreOptions = {}): RuleSet {
  const root = realpathSync(path.resolve(rootDir));
  const ignoreFileName = options.ignoreFileName || DEFAULT_IGNORE_FILE_NAME;
  const rules: IgnoreRule[] = [];

  if (options.useDefaults !== false) {
    rules.push(...parseIgnoreContent(DEFAULT_IGNORE_PATTERNS.join('\n')));
  }

  const directories: string[] = [];
  let current = root;
  while (true) {
    directories.push(current);
    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }
  directories.reverse();

  for (const directory of directories) {
    rules.push(...parseIgnoreFile(path.join(directory, ignoreFileName)));
  }

  if (options.additionalPatterns) {
    rules.push(...parseIgnoreContent(options.additionalPatterns.join('\n')));
  }

  return { root, rules };
}

/**
 * Derives the RuleSet of a subdirectory by appending its own ignore file's rules
 * The parent RuleSet is left untouched; it is returned as-is when the child adds nothing.
 * @param parent RuleSet of the parent directory
 * @param childDirPath Subdirectory path, absolute or relative to `parent.root`
 * @param ignoreFileName Name of the per-directory ignore file
 * @returns RuleSet for the subdirectory's entries
 */
export function composeChildRuleSet(
  parent: RuleSet,
  childDirPath: string,
  ignoreFileName: string = DEFAULT_IGNORE_FILE_NAME
): RuleSet {
  const childDir = path.resolve(parent.root, childDirPath);
  const localRules = parseIgnoreFile(path.join(childDir, ignoreFileName));

  if (localRules.length === 0) {
    return parent;
  }

  return {
    root: parent.root,
    rules: [...parent.rules, ...localRules],
  };
}

/**
 * Splits a relative path into components, accepting either separator
 * @param relativePath Path relative to a RuleSet root
 * @returns Path components without empty or `.` entries
 */
export function splitPath(relativePath: string): string[] {
  return relativePath.split(/[\\/]+/).filter(part => part !== '' && part !== '.');
}

/**
 * Re-expresses a candidate path relative to the directory a rule was defined in
 * @returns Components relative to the rule's base, or null if the candidate lies outside it
 */
function componentsForRule(
  rule: IgnoreRule,
  root: string,
  components: readonly string[]
): readonly string[] | null {
  if (rule.base === undefined) {
    return components;
  }

  const relative = path.relative(rule.base, path.join(root, ...components));
  if (path.isAbsolute(relative)) {
    return null;
  }

  const ruleComponents = splitPath(relative);
  if (ruleComponents[0] === '..') {
    return null;
  }

  return ruleComponents;
}

/**
 * Checks if a path should be ignored, the last matching rule deciding
 * @param ruleSet RuleSet in effect for the path's directory
 * @param candidatePath Path relative to `ruleSet.root`
 * @param isDirectory Whether the path is a directory
 * @returns IgnoreCheckResult naming the deciding rule, if any
 */
export function checkIgnore(
  ruleSet: RuleSet,
  candidatePath: string,
  isDirectory: boolean
): IgnoreCheckResult {
  const components = splitPath(candidatePath);
  let lastMatch: IgnoreRule | null = null;

  for (const rule of ruleSet.rules) {
    const ruleComponents = componentsForRule(rule, ruleSet.root, components);
    if (ruleComponents && ruleMatches(rule, ruleComponents, isDirectory)) {
      lastMatch = rule;
    }
  }

  if (!lastMatch) {
    return {
      shouldIgnore: false,
      reason: 'No ignore patterns matched',
    };
  }

  return {
    shouldIgnore: !lastMatch.negate,
    matchedPattern: lastMatch.source,
    reason: lastMatch.negate
      ? `Negation pattern "${lastMatch.source}" matched`
      : `Pattern "${lastMatch.source}" matched`,
  };
}

/**
 * Checks if a path should be ignored
 * @param ruleSet RuleSet in effect for the path's directory
 * @param candidatePath Path relative to `ruleSet.root`
 * @param isDirectory Whether the path is a directory
 * @returns boolean indicating whether to ignore the path
 */
export function isIgnored(ruleSet: RuleSet, candidatePath: string, isDirectory: boolean): boolean {
  return checkIgnore(ruleSet, candidatePath, isDirectory).shouldIgnore;
}

/**
 * Filters an array of file paths, removing those that should be ignored
 * Paths are treated as files, so directory-only rules do not apply to them.
 * @param ruleSet RuleSet to apply
 * @param filePaths File paths relative to `ruleSet.root`
 * @returns File paths that should not be ignored
 */
export function filterIgnoredPaths(ruleSet: RuleSet, filePaths: string[]): string[] {
  return filePaths.filter(filePath => !isIgnored(ruleSet, filePath, false));
}
