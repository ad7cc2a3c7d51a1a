/**
 * Execution coordinator - analyzes a module's files on a bounded pool
 */

import { availableParallelism } from 'node:os';
import { relative } from 'node:path';
import pLimit from 'p-limit';
import type { AstProvider, ParseOutcome } from '../ast/types.js';
import type { EffectiveConfig } from '../config/resolver.js';
import type { RuleRegistry } from '../rules/registry.js';
import type {
  AnalysisResult,
  FailurePolicy,
  IncompleteReason,
  Severity,
} from '../types.js';
import { severityRank } from '../types.js';
import {
  EMPTY_BASELINE,
  filterAgainstBaseline,
  type Baseline,
  type BaselineMode,
} from '../suppression/baseline.js';
import { analyzeFile, buildDispatchTable, type DispatchTable } from './traversal.js';
import { buildResult, type FileOutcome } from '../report/aggregator.js';
import { errorMessage } from '../errors.js';
import { compareStrings } from '../utils/ordering.js';
import { toPosixPath } from '../utils/pattern-matcher.js';
import { logDebug, logError, logInfo } from '../utils/logger.js';

export interface ModuleAnalysisRequest {
  /** Module identity reported in the result */
  module: string;
  files: readonly string[];
  provider: AstProvider;
  registry: RuleRegistry;
  config: EffectiveConfig;
  baseline?: Baseline;
  baselineMode?: BaselineMode;
  /** Concurrent file tasks, defaults to the available parallelism */
  workerCount?: number;
  /** Wall-clock budget for the whole module */
  timeoutMs?: number;
  /** Paths in the result are made relative to this directory */
  moduleRoot?: string;
  autoCorrect?: boolean;
  policy?: FailurePolicy;
  /** Overrides the config's failFast flag */
  failFast?: boolean;
  /** Lowest severity that trips fail-fast, default `error` */
  failFastThreshold?: Severity;
}

interface WorkItem {
  path: string;
  display: string;
}

interface TaskResult {
  outcome: FileOutcome;
  fingerprints?: ReadonlySet<string>;
}

/**
 * Analyze every file of a module and aggregate a deterministic result.
 * Output never depends on worker count or completion order.
 */
export async function analyzeModule(request: ModuleAnalysisRequest): Promise<AnalysisResult> {
  const {
    config,
    registry,
    provider,
    baseline = EMPTY_BASELINE,
    baselineMode = 'filter',
  } = request;
  const workerCount = Math.max(1, Math.floor(request.workerCount ?? availableParallelism()));
  const failFast = request.failFast ?? config.failFast;
  const threshold = severityRank(request.failFastThreshold ?? 'error');

  const toDisplay = (file: string): string =>
    toPosixPath(request.moduleRoot ? relative(request.moduleRoot, file) : file);

  const seen = new Set<string>();
  const items: WorkItem[] = [];
  let filesExcluded = 0;
  for (const path of request.files) {
    const display = toDisplay(path);
    if (seen.has(display)) {
      continue;
    }
    seen.add(display);
    if (config.isExcluded(display)) {
      filesExcluded++;
      continue;
    }
    items.push({ path, display });
  }
  items.sort((a, b) => compareStrings(a.display, b.display));

  logDebug(`Analyzing module '${request.module}'`, {
    files: items.length,
    excluded: filesExcluded,
    workers: workerCount,
  });

  const table = buildDispatchTable(config, registry);
  const results = new Array<TaskResult | undefined>(items.length);
  const controller = new AbortController();
  const limit = pLimit(workerCount);
  let stopReason: IncompleteReason | undefined;
  let finalized = false;

  const runItem = async (item: WorkItem, index: number): Promise<void> => {
    if (finalized) {
      return;
    }
    if (stopReason) {
      results[index] = incomplete(item.display, stopReason);
      return;
    }

    const result = await analyzeItem(item, {
      provider,
      config,
      registry,
      table,
      baseline,
      baselineMode,
      autoCorrect: request.autoCorrect === true,
      signal: controller.signal,
    });

    if (finalized) {
      // the module timed out while this file was running
      return;
    }
    results[index] = result;

    if (failFast && !stopReason && tripsFailFast(result.outcome, threshold)) {
      stopReason = 'fail-fast';
      logInfo(`Fail-fast triggered by ${item.display}; no new files will start`);
    }
  };

  const all = Promise.all(items.map((item, index) => limit(() => runItem(item, index))));

  if (request.timeoutMs === undefined) {
    await all;
  } else {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolveTimeout) => {
      timer = setTimeout(() => resolveTimeout('timeout'), request.timeoutMs);
    });
    const winner = await Promise.race([all.then(() => 'done' as const), timeout]).finally(() => {
      clearTimeout(timer);
    });

    if (winner === 'timeout') {
      finalized = true;
      controller.abort();
      let abandoned = 0;
      items.forEach((item, index) => {
        if (!results[index]) {
          results[index] = incomplete(item.display, 'timeout');
          abandoned++;
        }
      });
      logInfo(`Module '${request.module}' timed out after ${request.timeoutMs}ms`, { abandoned });
      void all.catch((error: unknown) => {
        logError('Abandoned file analysis failed', { error: errorMessage(error) });
      });
    }
  }

  const outcomes: FileOutcome[] = [];
  let baselineUpdate: Set<string> | undefined;
  if (baselineMode === 'update') {
    baselineUpdate = new Set<string>();
  }
  for (const result of results) {
    if (!result) continue;
    outcomes.push(result.outcome);
    if (baselineUpdate && result.fingerprints) {
      for (const fingerprint of result.fingerprints) {
        baselineUpdate.add(fingerprint);
      }
    }
  }

  const analysis = buildResult(outcomes, {
    module: request.module,
    policy: request.policy,
    notes: config.notes,
    warnings: config.warnings,
    filesExcluded,
    baselineUpdate,
  });

  logDebug(`Finished module '${request.module}'`, {
    findings: analysis.summary.total,
    diagnostics: analysis.diagnostics.length,
    passed: analysis.passed,
  });

  return analysis;
}

interface ItemContext {
  provider: AstProvider;
  config: EffectiveConfig;
  registry: RuleRegistry;
  table: DispatchTable;
  baseline: Baseline;
  baselineMode: BaselineMode;
  autoCorrect: boolean;
  signal: AbortSignal;
}

async function analyzeItem(item: WorkItem, context: ItemContext): Promise<TaskResult> {
  let parsed: ParseOutcome;
  try {
    parsed = await context.provider.parse(item.path, context.signal);
  } catch (error) {
    parsed = { ok: false, failure: { filePath: item.path, message: errorMessage(error) } };
  }

  if (!parsed.ok) {
    const { failure } = parsed;
    return {
      outcome: {
        status: 'parse-failure',
        file: item.display,
        diagnostic: {
          kind: 'parse-failure',
          file: item.display,
          message: failure.message,
          ...(failure.line !== undefined ? { line: failure.line } : {}),
          ...(failure.column !== undefined ? { column: failure.column } : {}),
        },
      },
    };
  }

  try {
    const analysis = analyzeFile(parsed.tree, context.config, context.registry, {
      displayPath: item.display,
      autoCorrect: context.autoCorrect,
      dispatchTable: context.table,
    });
    const filtered = filterAgainstBaseline(
      analysis.findings,
      context.baseline,
      context.baselineMode
    );

    return {
      outcome: {
        status: 'analyzed',
        file: item.display,
        findings: filtered.newlyIntroduced,
        ruleErrors: analysis.ruleErrors,
        corrections: analysis.corrections,
        inlineSuppressed: analysis.inlineSuppressed,
        baselineSuppressed: filtered.baselineSuppressed.length,
      },
      fingerprints: filtered.fingerprints,
    };
  } catch (error) {
    // rule failures are caught per invocation; this is a malformed tree
    const message = errorMessage(error);
    logError(`Analysis of ${item.display} failed`, { error: message });
    return incomplete(item.display, 'engine-error', message);
  }
}

function incomplete(file: string, reason: IncompleteReason, message?: string): TaskResult {
  return {
    outcome: {
      status: 'incomplete',
      file,
      diagnostic: {
        kind: 'incomplete',
        file,
        reason,
        ...(message !== undefined ? { message } : {}),
      },
    },
  };
}

function tripsFailFast(outcome: FileOutcome, threshold: number): boolean {
  if (outcome.status !== 'analyzed') {
    return false;
  }
  return (
    outcome.ruleErrors.length > 0 ||
    outcome.findings.some((finding) => severityRank(finding.severity) >= threshold)
  );
}
