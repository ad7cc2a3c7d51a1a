/**
 * Core types for the smell engine
 */

/**
 * Severity of a finding, lowest first
 */
export type Severity = 'style' | 'warning' | 'error' | 'defect';

export const SEVERITIES: readonly Severity[] = ['style', 'warning', 'error', 'defect'];

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

/**
 * Estimated cost of fixing a finding
 */
export interface Debt {
  days: number;
  hours: number;
  mins: number;
}

export const FIVE_MINS: Debt = { days: 0, hours: 0, mins: 5 };
export const TEN_MINS: Debt = { days: 0, hours: 0, mins: 10 };
export const TWENTY_MINS: Debt = { days: 0, hours: 0, mins: 20 };

export function debtInMinutes(debt: Debt): number {
  return debt.days * 24 * 60 + debt.hours * 60 + debt.mins;
}

/**
 * Location of a finding inside a file
 */
export interface Location {
  /** File path, relative to the module root when one is known */
  file: string;
  /** Starting line number (1-indexed) */
  startLine: number;
  /** Starting column number (0-indexed) */
  startColumn: number;
  /** Ending line number (1-indexed) */
  endLine: number;
  /** Ending column number (0-indexed) */
  endColumn: number;
}

/**
 * A reported code smell
 */
export interface Finding {
  /** Rule ID that generated this finding */
  ruleId: string;
  /** Effective severity after configuration overrides */
  severity: Severity;
  location: Location;
  /** Human-readable message describing the issue */
  message: string;
  /** Structural identity of the offending element, independent of line numbers */
  entitySignature: string;
  /** Hash used for suppression and baseline matching */
  fingerprint: string;
  debt: Debt;
}

/**
 * A single text replacement, offsets into the original file text
 */
export interface TextEdit {
  start: number;
  end: number;
  replacement: string;
}

export interface Correction {
  file: string;
  ruleId: string;
  edits: TextEdit[];
}

export interface ParseFailureDiagnostic {
  kind: 'parse-failure';
  file: string;
  message: string;
  line?: number;
  column?: number;
}

export interface InternalRuleErrorDiagnostic {
  kind: 'internal-rule-error';
  file: string;
  ruleId: string;
  nodeKind: string;
  line: number;
  message: string;
  stack?: string;
}

export type IncompleteReason = 'fail-fast' | 'timeout' | 'engine-error';

export interface IncompleteDiagnostic {
  kind: 'incomplete';
  file: string;
  reason: IncompleteReason;
  /** Set for `engine-error` */
  message?: string;
}

/**
 * Per-file problems surfaced next to the findings instead of being thrown
 */
export type Diagnostic =
  | ParseFailureDiagnostic
  | InternalRuleErrorDiagnostic
  | IncompleteDiagnostic;

/**
 * Configuration problems that do not stop the run
 */
export type ConfigWarning =
  | { code: 'unknown-rule-id'; ruleId: string; layer: string }
  | { code: 'invalid-parameters'; ruleId: string; layer: string; message: string };

/**
 * Informational notes carried into the result
 */
export type Note =
  | { kind: 'rule-degraded'; ruleId: string; message: string }
  | { kind: 'config-warning'; warning: ConfigWarning }
  | { kind: 'baseline-suppressed'; count: number };

/**
 * Caller-supplied pass/fail policy
 */
export interface FailurePolicy {
  /** Any finding at or above this severity fails the module. `never` disables it. */
  failOnSeverity?: Severity | 'never';
  /** Fail when more findings than this are reported */
  maxIssues?: number;
  /** Fail when any diagnostic (parse failure, rule error, incomplete file) exists */
  failOnDiagnostics?: boolean;
}

export interface FileReport {
  file: string;
  findings: Finding[];
}

export interface AnalysisSummary {
  bySeverity: Record<Severity, number>;
  total: number;
  baselineSuppressed: number;
  inlineSuppressed: number;
  filesAnalyzed: number;
  filesExcluded: number;
  filesFailed: number;
  filesIncomplete: number;
  debtMinutes: number;
}

/**
 * Complete, deterministic result of analyzing one module
 */
export interface AnalysisResult {
  module: string;
  /** Findings sorted by file, location, then rule id */
  findings: Finding[];
  /** Findings grouped by file, files in path order */
  files: FileReport[];
  diagnostics: Diagnostic[];
  corrections: Correction[];
  summary: AnalysisSummary;
  notes: Note[];
  passed: boolean;
  /** Full fingerprint set to persist, present in baseline update mode */
  baselineUpdate?: string[];
}
