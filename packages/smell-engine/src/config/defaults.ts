/**
 * Default configuration values
 */

import type { ConfigLayer } from './schema.js';

/**
 * Default exclude patterns
 */
export const DEFAULT_EXCLUDE_PATTERNS = [
  '**/node_modules/**',
  '**/.git/**',
  '**/dist/**',
  '**/build/**',
  '**/*.d.ts',
];

/**
 * Config file names searched in a module directory, in priority order
 */
export const CONFIG_FILE_NAMES = [
  'smell.config.ts',
  'smell.config.js',
  'smell.config.mjs',
  'smell.config.json',
];

export const DEFAULT_BASELINE_FILE = 'smell-baseline.json';

/**
 * Lowest-priority layer. Rule defaults come from the registry itself.
 */
export const DEFAULT_LAYER: ConfigLayer = {
  name: 'defaults',
  excludes: DEFAULT_EXCLUDE_PATTERNS,
  failFast: false,
};
