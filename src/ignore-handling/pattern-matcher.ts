import type { IgnoreRule, MatchSegmentFunction, RuleMatchesFunction } from './types.js';

const DOUBLE_STAR = '**';

/**
 * Match one pattern segment against one path component
 * `*` matches any run of characters (including none), `?` exactly one character.
 * On a mismatch the scan resumes from the last `*`, which then absorbs one more character.
 */
export const matchSegment: MatchSegmentFunction = (
  segment: string,
  component: string
): boolean => {
  let s = 0;
  let c = 0;
  let starIndex = -1;
  let starComponentIndex = 0;

  while (c < component.length) {
    if (s < segment.length && (segment[s] === component[c] || segment[s] === '?')) {
      s++;
      c++;
    } else if (s < segment.length && segment[s] === '*') {
      starIndex = s;
      starComponentIndex = c;
      s++;
    } else if (starIndex !== -1) {
      s = starIndex + 1;
      c = ++starComponentIndex;
    } else {
      return false;
    }
  }

  while (s < segment.length && segment[s] === '*') {
    s++;
  }

  return s === segment.length;
};

/**
 * Match a segment sequence against path components from the given cursors
 * Both sequences must be fully consumed; trailing `**` segments may match nothing.
 * @param segments Rule segments
 * @param components Path components
 * @param segmentIndex Segment cursor
 * @param componentIndex Component cursor
 * @returns True if the remaining segments match the remaining components
 */
export function matchSegments(
  segments: readonly string[],
  components: readonly string[],
  segmentIndex = 0,
  componentIndex = 0
): boolean {
  let i = segmentIndex;
  let j = componentIndex;

  while (i < segments.length && j < components.length) {
    if (segments[i] === DOUBLE_STAR) {
      if (i === segments.length - 1) {
        return true;
      }
      for (let next = j; next <= components.length; next++) {
        if (matchSegments(segments, components, i + 1, next)) {
          return true;
        }
      }
      return false;
    }

    if (!matchSegment(segments[i], components[j])) {
      return false;
    }
    i++;
    j++;
  }

  if (i < segments.length) {
    return segments.slice(i).every(segment => segment === DOUBLE_STAR);
  }

  return j === components.length;
}

/**
 * Decide whether a rule matches a path relative to the rule's base directory
 * Anchored rules must match from the first component; others may start at any component.
 */
export const ruleMatches: RuleMatchesFunction = (
  rule: IgnoreRule,
  components: readonly string[],
  isDirectory: boolean
): boolean => {
  if (rule.directoryOnly && !isDirectory) {
    return false;
  }

  if (rule.anchored) {
    return matchSegments(rule.segments, components);
  }

  for (let start = 0; start < components.length; start++) {
    if (matchSegments(rule.segments, components, 0, start)) {
      return true;
    }
  }

  return false;
};
