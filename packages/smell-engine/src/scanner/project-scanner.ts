/**
 * Project scanner - loads config, discovers files and analyzes one module
 */

import { basename, join, resolve } from 'node:path';
import type { AnalysisResult, FailurePolicy } from '../types.js';
import type { ConfigLayer } from '../config/schema.js';
import { loadModuleLayers, type LoadedModuleConfig } from '../config/loader.js';
import { DEFAULT_BASELINE_FILE } from '../config/defaults.js';
import { createModuleConfig, resolve as resolveConfig } from '../config/resolver.js';
import { createBuiltinRegistry, type RuleRegistry } from '../rules/registry.js';
import { TypeScriptAstProvider } from '../parser/typescript-provider.js';
import { analyzeModule } from '../engine/coordinator.js';
import { buildResult } from '../report/aggregator.js';
import {
  EMPTY_BASELINE,
  JsonBaselineStore,
  type Baseline,
} from '../suppression/baseline.js';
import { discoverFiles, DEFAULT_EXTENSIONS } from './file-discovery.js';
import { ENGINE_VERSION } from '../version.js';
import { logError, logInfo } from '../utils/logger.js';

/**
 * Error encountered while setting up a project analysis
 */
export interface ScanError {
  /** Stage or file where the error occurred */
  file: string;
  /** Error message */
  message: string;
  /** Stack trace if available */
  stack?: string;
}

export interface ScanMetadata {
  /** Timestamp when the analysis started */
  timestamp: string;
  durationMs: number;
  engineVersion: string;
  filesDiscovered: number;
  /** Config files that contributed layers */
  configSources: string[];
}

export interface ProjectAnalysis {
  result: AnalysisResult;
  errors: ScanError[];
  metadata: ScanMetadata;
}

export interface ProjectAnalysisOptions {
  /** Module name in the result, defaults to the directory name */
  module?: string;
  /** Module config file (defaults to searching for smell.config.*) */
  configPath?: string;
  globalConfigPath?: string;
  /** Highest-priority config layer */
  overrides?: ConfigLayer;
  /** Defaults to the sealed built-in registry */
  registry?: RuleRegistry;
  /** Build type information; false runs in degraded mode */
  semantic?: boolean;
  /** Overrides the baseline named in config */
  baselinePath?: string;
  /** Rewrite the baseline with every current finding */
  updateBaseline?: boolean;
  workerCount?: number;
  timeoutMs?: number;
  autoCorrect?: boolean;
  /** Merged over the policy from config files */
  policy?: FailurePolicy;
  extensions?: string[];
  /**
   * Whether to throw on config/discovery/baseline errors or return them in `errors`
   * @default true
   */
  throwOnError?: boolean;
}

/**
 * Analyze one module directory
 */
export async function analyzeProject(
  modulePath: string,
  options: ProjectAnalysisOptions = {}
): Promise<ProjectAnalysis> {
  const startTime = Date.now();
  const timestamp = new Date(startTime).toISOString();
  const throwOnError = options.throwOnError !== false; // default to true
  const moduleRoot = resolve(modulePath);
  const moduleName = options.module ?? basename(moduleRoot);
  const errors: ScanError[] = [];

  // Registry misuse is always fatal
  const registry = options.registry ?? createBuiltinRegistry();

  const record = (error: unknown, stage: string): void => {
    if (throwOnError) {
      throw error;
    }
    logError(`Analysis failed during ${stage}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    errors.push({
      file: stage,
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  };

  const fail = (error: unknown, stage: string): ProjectAnalysis => {
    record(error, stage);
    return {
      result: buildResult([], { module: moduleName }),
      errors,
      metadata: {
        timestamp,
        durationMs: Date.now() - startTime,
        engineVersion: ENGINE_VERSION,
        filesDiscovered: 0,
        configSources: [],
      },
    };
  };

  let loaded: LoadedModuleConfig;
  try {
    loaded = await loadModuleLayers({
      modulePath: moduleRoot,
      configPath: options.configPath,
      globalConfigPath: options.globalConfigPath,
      overrides: options.overrides,
    });
  } catch (error) {
    return fail(error, 'config-loading');
  }

  let files: string[];
  try {
    files = await discoverFiles(moduleRoot, options.extensions ?? DEFAULT_EXTENSIONS);
  } catch (error) {
    return fail(error, 'file-discovery');
  }

  // a missing baseline file loads as empty
  const baselinePath =
    options.baselinePath !== undefined
      ? resolve(moduleRoot, options.baselinePath)
      : loaded.baselinePath ?? join(moduleRoot, DEFAULT_BASELINE_FILE);
  const store = new JsonBaselineStore(baselinePath);

  let baseline: Baseline = EMPTY_BASELINE;
  if (!options.updateBaseline) {
    try {
      baseline = await store.load();
    } catch (error) {
      return fail(error, 'baseline-loading');
    }
  }

  const provider = new TypeScriptAstProvider(files, { semantic: options.semantic });
  const config = resolveConfig(createModuleConfig(loaded.layers), registry, {
    semanticContextAvailable: provider.hasSemanticContext,
  });

  const result = await analyzeModule({
    module: moduleName,
    files,
    provider,
    registry,
    config,
    baseline,
    baselineMode: options.updateBaseline ? 'update' : 'filter',
    workerCount: options.workerCount,
    timeoutMs: options.timeoutMs,
    moduleRoot,
    autoCorrect: options.autoCorrect,
    policy: { ...loaded.policy, ...options.policy },
  });

  if (options.updateBaseline && result.baselineUpdate) {
    try {
      await store.save(result.baselineUpdate);
      logInfo(`Baseline written to ${store.path}`, { fingerprints: result.baselineUpdate.length });
    } catch (error) {
      // the analysis itself is still reported
      record(error, 'baseline-writing');
    }
  }

  return {
    result,
    errors,
    metadata: {
      timestamp,
      durationMs: Date.now() - startTime,
      engineVersion: ENGINE_VERSION,
      filesDiscovered: files.length,
      configSources: loaded.sources,
    },
  };
}
