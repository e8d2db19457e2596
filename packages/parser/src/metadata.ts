/**
 * Helpers for the approximate whole-file flags each language computes.
 */

/**
 * Test files by path: anything mentioning test, spec or __tests__.
 */
export function isTestPath(filename: string): boolean {
  return ['test', 'spec', '__tests__'].some(pattern => filename.includes(pattern));
}

/**
 * Distinct first capture groups of `pattern` in `content`, in order of
 * first appearance. `pattern` must be global.
 */
export function uniqueMatches(pattern: RegExp, content: string): string[] {
  const seen = new Set<string>();
  for (const match of content.matchAll(pattern)) {
    if (match[1] !== undefined) seen.add(match[1]);
  }
  return [...seen];
}
