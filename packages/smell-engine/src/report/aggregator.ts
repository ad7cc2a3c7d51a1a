/**
 * Report aggregator - turns per-file outcomes into the final result
 */

import type {
  AnalysisResult,
  AnalysisSummary,
  ConfigWarning,
  Correction,
  Diagnostic,
  FailurePolicy,
  FileReport,
  Finding,
  IncompleteDiagnostic,
  InternalRuleErrorDiagnostic,
  Note,
  ParseFailureDiagnostic,
  Severity,
} from '../types.js';
import { debtInMinutes, severityRank } from '../types.js';
import { compareStrings } from '../utils/ordering.js';

/**
 * What one file produced
 */
export type FileOutcome =
  | {
      status: 'analyzed';
      file: string;
      findings: Finding[];
      ruleErrors: InternalRuleErrorDiagnostic[];
      corrections: Correction[];
      inlineSuppressed: number;
      baselineSuppressed: number;
    }
  | { status: 'parse-failure'; file: string; diagnostic: ParseFailureDiagnostic }
  | { status: 'incomplete'; file: string; diagnostic: IncompleteDiagnostic };

export interface BuildOptions {
  module: string;
  policy?: FailurePolicy;
  /** Degraded-mode notes from the resolved config */
  notes?: readonly Note[];
  warnings?: readonly ConfigWarning[];
  filesExcluded?: number;
  /** Fingerprints collected in baseline update mode */
  baselineUpdate?: ReadonlySet<string>;
}

export const DEFAULT_POLICY: Required<Omit<FailurePolicy, 'maxIssues'>> = {
  failOnSeverity: 'error',
  failOnDiagnostics: false,
};

export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareStrings(a.location.file, b.location.file) ||
    a.location.startLine - b.location.startLine ||
    a.location.startColumn - b.location.startColumn ||
    a.location.endLine - b.location.endLine ||
    a.location.endColumn - b.location.endColumn ||
    compareStrings(a.ruleId, b.ruleId) ||
    compareStrings(a.message, b.message) ||
    compareStrings(a.fingerprint, b.fingerprint)
  );
}

const DIAGNOSTIC_ORDER: Record<Diagnostic['kind'], number> = {
  'parse-failure': 0,
  'internal-rule-error': 1,
  incomplete: 2,
};

function diagnosticLine(diagnostic: Diagnostic): number {
  switch (diagnostic.kind) {
    case 'parse-failure':
      return diagnostic.line ?? 0;
    case 'internal-rule-error':
      return diagnostic.line;
    case 'incomplete':
      return 0;
  }
}

function diagnosticRule(diagnostic: Diagnostic): string {
  return diagnostic.kind === 'internal-rule-error' ? diagnostic.ruleId : '';
}

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    compareStrings(a.file, b.file) ||
    DIAGNOSTIC_ORDER[a.kind] - DIAGNOSTIC_ORDER[b.kind] ||
    diagnosticLine(a) - diagnosticLine(b) ||
    compareStrings(diagnosticRule(a), diagnosticRule(b)) ||
    compareStrings(
      a.kind === 'incomplete' ? a.reason : a.message,
      b.kind === 'incomplete' ? b.reason : b.message
    )
  );
}

/**
 * Decide pass/fail for a module
 */
export function evaluatePolicy(
  findings: readonly Finding[],
  diagnostics: readonly Diagnostic[],
  policy: FailurePolicy = {}
): boolean {
  const failOnSeverity = policy.failOnSeverity ?? DEFAULT_POLICY.failOnSeverity;
  const failOnDiagnostics = policy.failOnDiagnostics ?? DEFAULT_POLICY.failOnDiagnostics;

  if (failOnSeverity !== 'never') {
    const threshold = severityRank(failOnSeverity);
    if (findings.some((finding) => severityRank(finding.severity) >= threshold)) {
      return false;
    }
  }

  if (policy.maxIssues !== undefined && findings.length > policy.maxIssues) {
    return false;
  }

  if (failOnDiagnostics && diagnostics.length > 0) {
    return false;
  }

  return true;
}

/**
 * Pure and deterministic: the same outcomes in any order give the same result
 */
export function buildResult(
  outcomes: readonly FileOutcome[],
  options: BuildOptions
): AnalysisResult {
  const findings: Finding[] = [];
  const diagnostics: Diagnostic[] = [];
  const corrections: Correction[] = [];
  let inlineSuppressed = 0;
  let baselineSuppressed = 0;
  let filesAnalyzed = 0;
  let filesFailed = 0;
  let filesIncomplete = 0;

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'analyzed':
        filesAnalyzed++;
        findings.push(...outcome.findings);
        diagnostics.push(...outcome.ruleErrors);
        corrections.push(...outcome.corrections);
        inlineSuppressed += outcome.inlineSuppressed;
        baselineSuppressed += outcome.baselineSuppressed;
        break;
      case 'parse-failure':
        filesFailed++;
        diagnostics.push(outcome.diagnostic);
        break;
      case 'incomplete':
        filesIncomplete++;
        diagnostics.push(outcome.diagnostic);
        break;
    }
  }

  findings.sort(compareFindings);
  diagnostics.sort(compareDiagnostics);
  corrections.sort(
    (a, b) =>
      compareStrings(a.file, b.file) ||
      (a.edits[0]?.start ?? 0) - (b.edits[0]?.start ?? 0) ||
      compareStrings(a.ruleId, b.ruleId)
  );

  const bySeverity: Record<Severity, number> = { style: 0, warning: 0, error: 0, defect: 0 };
  let debtMinutes = 0;
  for (const finding of findings) {
    bySeverity[finding.severity]++;
    debtMinutes += debtInMinutes(finding.debt);
  }

  const summary: AnalysisSummary = {
    bySeverity,
    total: findings.length,
    baselineSuppressed,
    inlineSuppressed,
    filesAnalyzed,
    filesExcluded: options.filesExcluded ?? 0,
    filesFailed,
    filesIncomplete,
    debtMinutes,
  };

  const notes: Note[] = [
    ...(options.notes ?? []),
    ...(options.warnings ?? []).map((warning): Note => ({ kind: 'config-warning', warning })),
  ];
  if (baselineSuppressed > 0) {
    notes.push({ kind: 'baseline-suppressed', count: baselineSuppressed });
  }

  const result: AnalysisResult = {
    module: options.module,
    findings,
    files: groupByFile(findings),
    diagnostics,
    corrections,
    summary,
    notes,
    passed: evaluatePolicy(findings, diagnostics, options.policy),
  };

  if (options.baselineUpdate) {
    result.baselineUpdate = Array.from(options.baselineUpdate).sort(compareStrings);
  }

  return result;
}

function groupByFile(sorted: readonly Finding[]): FileReport[] {
  const reports: FileReport[] = [];
  for (const finding of sorted) {
    const last = reports[reports.length - 1];
    if (last && last.file === finding.location.file) {
      last.findings.push(finding);
    } else {
      reports.push({ file: finding.location.file, findings: [finding] });
    }
  }
  return reports;
}
