/**
 * Glob matching for exclude patterns.
 */

import { minimatch } from 'minimatch';

export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

export function matchesPattern(filePath: string, patterns: readonly string[]): boolean {
  const normalized = toPosixPath(filePath);
  return patterns.some((pattern) =>
    minimatch(normalized, pattern, { dot: true })
  );
}
