/**
 * Literal and trailing-wildcard value patterns used by allowlist/denylist rules
 */

export const WILDCARD = '*';

export function isWildcard(pattern: string): boolean {
  return pattern.endsWith(WILDCARD);
}

/**
 * Part of the pattern that must match literally
 */
export function literalPrefix(pattern: string): string {
  return isWildcard(pattern) ? pattern.slice(0, -1) : pattern;
}

/**
 * `*` may appear only once, as the last character
 */
export function isValidPattern(pattern: string): boolean {
  if (pattern.length === 0) {
    return false;
  }
  const star = pattern.indexOf(WILDCARD);
  return star === -1 || star === pattern.length - 1;
}

export function matchesPattern(pattern: string, value: string): boolean {
  if (isWildcard(pattern)) {
    return value.startsWith(literalPrefix(pattern));
  }
  return pattern === value;
}

/**
 * Ranking used to pick the authoritative match: a longer literal prefix wins,
 * and an exact literal beats a wildcard with the same prefix.
 */
export function specificity(pattern: string): number {
  return literalPrefix(pattern).length * 2 + (isWildcard(pattern) ? 0 : 1);
}

/**
 * Most specific pattern matching `value`. The first one wins ties.
 */
export function mostSpecificMatch(patterns: readonly string[], value: string): string | undefined {
  let best: string | undefined;
  for (const pattern of patterns) {
    if (!matchesPattern(pattern, value)) {
      continue;
    }
    if (best === undefined || specificity(pattern) > specificity(best)) {
      best = pattern;
    }
  }
  return best;
}
