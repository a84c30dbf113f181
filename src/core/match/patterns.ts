import picomatch from 'picomatch';

export type PathMatcher = (path: string) => boolean;

const matcherCache = new Map<string, PathMatcher>();

/**
 * Normalize a repo-relative path: forward slashes, no leading `./`.
 */
export function normalizePath(p: string): string {
  return p.replaceAll('\\', '/').replace(/^(\.\/)+/, '');
}

export function compileMatcher(pattern: string): PathMatcher {
  let m = matcherCache.get(pattern);
  if (!m) {
    const isMatch = picomatch(pattern, { dot: true });
    m = (p: string) => isMatch(normalizePath(p));
    matcherCache.set(pattern, m);
  }
  return m;
}

export function matchesPattern(path: string, pattern: string): boolean {
  return compileMatcher(pattern)(path);
}

export function matchesAny(path: string, patterns: readonly string[]): boolean {
  return patterns.some((p) => matchesPattern(path, p));
}

/**
 * True when every file matches at least one pattern. An empty changeset never
 * matches, so nothing is waived when there is nothing to look at.
 */
export function allPathsMatch(files: readonly string[], patterns: readonly string[]): boolean {
  if (files.length === 0 || patterns.length === 0) return false;
  return files.every((f) => matchesAny(f, patterns));
}

/**
 * Number of literal (non-glob) characters in a pattern; used to rank rules by specificity.
 */
export function literalLength(pattern: string): number {
  return pattern.replaceAll(/[*?[\]{}()!+]/g, '').length;
}
