/**
 * Configuration loader
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { createJiti } from 'jiti';
import { configFileSchema, type ConfigFile, type ConfigLayer } from './schema.js';
import { CONFIG_FILE_NAMES, DEFAULT_LAYER } from './defaults.js';
import { ConfigLoadError } from '../errors.js';
import type { FailurePolicy } from '../types.js';

/**
 * Load and validate one configuration file
 */
export async function loadConfigFile(configFilePath: string): Promise<ConfigFile> {
  const absolutePath = resolve(configFilePath);

  try {
    let rawConfig: unknown;

    // Use jiti for .ts files, JSON.parse for .json, dynamic import for .js/.mjs
    if (absolutePath.endsWith('.ts')) {
      const jiti = createJiti(pathToFileURL(absolutePath).href, {
        interopDefault: true,
        moduleCache: false,
      });
      rawConfig = await jiti.import(absolutePath, { default: true });
    } else if (absolutePath.endsWith('.json')) {
      rawConfig = JSON.parse(await readFile(absolutePath, 'utf-8'));
    } else {
      const configModule: unknown = await import(pathToFileURL(absolutePath).href);
      rawConfig =
        typeof configModule === 'object' && configModule !== null && 'default' in configModule
          ? configModule.default
          : configModule;
    }

    // Validate config against schema
    return configFileSchema.parse(rawConfig);
  } catch (error) {
    throw new ConfigLoadError(absolutePath, error);
  }
}

/**
 * Find config file in a module directory
 */
export function findConfigFile(directory: string): string | null {
  for (const fileName of CONFIG_FILE_NAMES) {
    const candidate = join(directory, fileName);
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  return null;
}

export interface LoadModuleLayersOptions {
  modulePath: string;
  /** Configuration shared by all modules */
  globalConfigPath?: string;
  /** Explicit module config file; otherwise searched in the module directory */
  configPath?: string;
  /** Highest-priority layer, e.g. from the caller's own options */
  overrides?: ConfigLayer;
}

export interface LoadedModuleConfig {
  /** Lowest priority first: defaults, global, module, overrides */
  layers: ConfigLayer[];
  /** Baseline path from the nearest file that sets one, resolved */
  baselinePath?: string;
  policy: FailurePolicy;
  /** Config files that contributed, in load order */
  sources: string[];
}

/**
 * Load the layered configuration for one module
 */
export async function loadModuleLayers(
  options: LoadModuleLayersOptions
): Promise<LoadedModuleConfig> {
  const modulePath = resolve(options.modulePath);
  const layers: ConfigLayer[] = [DEFAULT_LAYER];
  const sources: string[] = [];
  const policy: FailurePolicy = {};
  let baselinePath: string | undefined;

  const apply = (file: ConfigFile, filePath: string, layerName: string, baseDir: string): void => {
    const { baseline, maxIssues, failOnSeverity, ...layer } = file;
    layers.push({ ...layer, name: layer.name ?? layerName });
    sources.push(filePath);
    if (baseline !== undefined) baselinePath = resolve(baseDir, baseline);
    if (maxIssues !== undefined) policy.maxIssues = maxIssues;
    if (failOnSeverity !== undefined) policy.failOnSeverity = failOnSeverity;
  };

  if (options.globalConfigPath) {
    const globalPath = resolve(options.globalConfigPath);
    apply(await loadConfigFile(globalPath), globalPath, 'global', modulePath);
  }

  const moduleConfigPath = options.configPath
    ? resolve(modulePath, options.configPath)
    : findConfigFile(modulePath);
  if (moduleConfigPath) {
    apply(await loadConfigFile(moduleConfigPath), moduleConfigPath, 'module', modulePath);
  }

  if (options.overrides) {
    layers.push({ ...options.overrides, name: options.overrides.name ?? 'overrides' });
  }

  return { layers, baselinePath, policy, sources };
}
