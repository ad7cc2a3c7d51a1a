/**
 * File discovery - finds the source files of a module
 */

import fg from 'fast-glob';
import { existsSync, statSync } from 'node:fs';

export const DEFAULT_EXTENSIONS = ['ts', 'tsx', 'mts', 'cts', 'js', 'jsx', 'mjs', 'cjs'];

/**
 * Directories never worth walking. Configured excludes are applied later by
 * the coordinator so they show up in the excluded count.
 */
export const ALWAYS_IGNORED = ['**/node_modules/**', '**/.git/**'];

/**
 * Discover source files under a module directory, sorted
 */
export async function discoverFiles(
  moduleDir: string,
  extensions: readonly string[] = DEFAULT_EXTENSIONS,
  ignorePatterns: readonly string[] = ALWAYS_IGNORED
): Promise<string[]> {
  if (!existsSync(moduleDir) || !statSync(moduleDir).isDirectory()) {
    throw new Error(`Module directory does not exist: ${moduleDir}`);
  }

  const patterns = extensions.map((extension) => `**/*.${extension}`);
  const files = await fg(patterns, {
    cwd: moduleDir,
    absolute: true,
    dot: true,
    ignore: [...ignorePatterns],
  });

  return files.sort();
}
