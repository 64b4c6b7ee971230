/**
 * A single parsed line of an ignore file
 */
export interface IgnoreRule {
  /** Pattern text with the `!`, leading `/` and trailing `/` markers removed */
  readonly pattern: string;
  /** Pattern split on `/`; a `**` segment matches zero or more path components */
  readonly segments: readonly string[];
  /** Line started with `!` (re-includes a previously ignored path) */
  readonly negate: boolean;
  /** Line ended with `/` (matches directories only) */
  readonly directoryOnly: boolean;
  /** Line started with `/` (match must begin at the rule's base directory) */
  readonly anchored: boolean;
  /** Trimmed original line, for diagnostics */
  readonly source: string;
  /** Absolute directory the rule was defined in; unset means the scan root */
  readonly base?: string;
}

/**
 * Ordered rules that apply at one directory level, later rules taking precedence
 */
export interface RuleSet {
  /** Absolute, canonical directory that candidate paths are relative to */
  readonly root: string;
  readonly rules: readonly IgnoreRule[];
}

/**
 * Options for seeding the rule set of a scan root
 */
export interface IgnoreOptions {
  /** Name of the per-directory ignore file (defaults to .gitignore) */
  ignoreFileName?: string;
  /** Additional pattern lines appended after the ignore files */
  additionalPatterns?: string[];
  /** Whether to prepend the default ignore patterns */
  useDefaults?: boolean;
}

/**
 * Result of checking if a path should be ignored
 */
export interface IgnoreCheckResult {
  /** Whether the path should be ignored */
  shouldIgnore: boolean;
  /** Source line of the last matching rule (if any) */
  matchedPattern?: string;
  /** Reason for the verdict */
  reason?: string;
}

/**
 * Function signatures for matching operations
 */

/**
 * Match one pattern segment against one path component
 * @param segment Pattern segment without slashes (`*` and `?` are wildcards)
 * @param component Path component to test
 */
export type MatchSegmentFunction = (segment: string, component: string) => boolean;

/**
 * Decide whether a rule matches a path already made relative to the rule's base
 * @param rule Rule to test
 * @param components Path components relative to the rule's base directory
 * @param isDirectory Whether the candidate is a directory
 */
export type RuleMatchesFunction = (
  rule: IgnoreRule,
  components: readonly string[],
  isDirectory: boolean
) => boolean;
