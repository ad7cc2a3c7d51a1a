/**
 * smell-engine - Main Entry Point
 *
 * Rule execution and configuration resolution for code smell analysis
 */

export type {
  AnalysisResult,
  AnalysisSummary,
  ConfigWarning,
  Correction,
  Debt,
  Diagnostic,
  FailurePolicy,
  FileReport,
  Finding,
  IncompleteDiagnostic,
  IncompleteReason,
  InternalRuleErrorDiagnostic,
  Location,
  Note,
  ParseFailureDiagnostic,
  Severity,
  TextEdit,
} from './types.js';
export {
  SEVERITIES,
  FIVE_MINS,
  TEN_MINS,
  TWENTY_MINS,
  debtInMinutes,
  severityRank,
} from './types.js';

export {
  EngineError,
  DuplicateRuleIdError,
  RegistryClosedError,
  InvalidRuleIdError,
  ConfigLoadError,
  BaselineFormatError,
} from './errors.js';

export type {
  AstProvider,
  ParseFailure,
  ParseOutcome,
  SemanticContext,
  SourceRange,
  SourceTree,
  SyntaxNode,
} from './ast/types.js';
export { nodeText } from './ast/types.js';

export type {
  FindingSink,
  ReportedSmell,
  RuleConfiguration,
  RuleContext,
  RuleDescriptor,
} from './rules/rule.js';
export { RuleRegistry, BUILTIN_RULES, createBuiltinRegistry } from './rules/registry.js';

export type { ConfigFile, ConfigLayer, RuleConfig } from './config/schema.js';
export { configFileSchema, configLayerSchema } from './config/schema.js';
export type { EffectiveConfig, ModuleConfig, ResolveOptions } from './config/resolver.js';
export { createModuleConfig, mergeLayers, resolve } from './config/resolver.js';
export { findConfigFile, loadConfigFile, loadModuleLayers } from './config/loader.js';
export { DEFAULT_EXCLUDE_PATTERNS } from './config/defaults.js';

export type {
  Baseline,
  BaselineFilterResult,
  BaselineMode,
  BaselineStore,
} from './suppression/baseline.js';
export { filterAgainstBaseline, JsonBaselineStore } from './suppression/baseline.js';
export type { SuppressionDirective } from './suppression/directives.js';
export { isSuppressed, parseDirectives } from './suppression/directives.js';
export { computeFingerprint } from './suppression/fingerprint.js';

export type { AnalyzeFileOptions, FileAnalysis } from './engine/traversal.js';
export { analyzeFile, buildDispatchTable } from './engine/traversal.js';
export { applyTextEdits } from './engine/text-edits.js';
export type { ModuleAnalysisRequest } from './engine/coordinator.js';
export { analyzeModule } from './engine/coordinator.js';
export type { FileOutcome } from './report/aggregator.js';
export { buildResult, evaluatePolicy } from './report/aggregator.js';

export { TypeScriptAstProvider } from './parser/typescript-provider.js';
export type {
  ProjectAnalysis,
  ProjectAnalysisOptions,
  ScanError,
  ScanMetadata,
} from './scanner/project-scanner.js';
export { analyzeProject } from './scanner/project-scanner.js';

export type { LogLevel } from './utils/logger.js';
export { setLogLevel } from './utils/logger.js';
