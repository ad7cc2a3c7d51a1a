/**
 * Traversal engine - single-pass, multi-rule dispatch over one file's tree
 */

import type { SourceTree, SyntaxNode } from '../ast/types.js';
import { nodeText } from '../ast/types.js';
import type { EffectiveConfig } from '../config/resolver.js';
import type { RuleRegistry } from '../rules/registry.js';
import type {
  FindingSink,
  ReportedSmell,
  RuleConfiguration,
  RuleContext,
  RuleDescriptor,
} from '../rules/rule.js';
import type { Correction, Finding, InternalRuleErrorDiagnostic } from '../types.js';
import {
  isSuppressed,
  parseDirectives,
  type SuppressionDirective,
} from '../suppression/directives.js';
import {
  childSegments,
  computeFingerprint,
  entitySignature,
} from '../suppression/fingerprint.js';
import { compareStrings } from '../utils/ordering.js';
import { errorMessage } from '../errors.js';

export interface ActiveRule {
  descriptor: RuleDescriptor;
  config: RuleConfiguration;
}

export type DispatchTable = ReadonlyMap<string, readonly ActiveRule[]>;

export interface AnalyzeFileOptions {
  /** Path used in locations and signatures; defaults to the tree's path */
  displayPath?: string;
  /** Collect edits from auto-correctable rules */
  autoCorrect?: boolean;
  /** Reuse a table built by buildDispatchTable */
  dispatchTable?: DispatchTable;
}

export interface FileAnalysis {
  file: string;
  /** Pre-order, rules in id order within a node */
  findings: Finding[];
  ruleErrors: InternalRuleErrorDiagnostic[];
  inlineSuppressed: number;
  corrections: Correction[];
}

interface DirectiveIndex {
  /** Node directives covering each node: its own and its ancestors' */
  scopes: ReadonlyMap<SyntaxNode, readonly SuppressionDirective[]>;
  fileDirectives: SuppressionDirective[];
}

/**
 * Node kind -> enabled rules interested in it, ascending by rule id
 */
export function buildDispatchTable(
  config: EffectiveConfig,
  registry: RuleRegistry
): DispatchTable {
  const table = new Map<string, ActiveRule[]>();

  for (const ruleId of config.activeRuleIds()) {
    const descriptor = registry.lookup(ruleId);
    const ruleConfig = config.ruleConfig(ruleId);
    if (!descriptor || !ruleConfig) {
      continue;
    }

    for (const kind of new Set(descriptor.nodeInterest)) {
      const rules = table.get(kind) ?? [];
      rules.push({ descriptor, config: ruleConfig });
      table.set(kind, rules);
    }
  }

  for (const rules of table.values()) {
    rules.sort((a, b) => compareStrings(a.descriptor.id, b.descriptor.id));
  }

  return table;
}

/**
 * Walk the tree once in pre-order and run every interested rule at each node.
 * A rule that throws is recorded and skipped for that node only.
 */
export function analyzeFile(
  tree: SourceTree,
  config: EffectiveConfig,
  registry: RuleRegistry,
  options: AnalyzeFileOptions = {}
): FileAnalysis {
  const file = options.displayPath ?? tree.filePath;
  const table = options.dispatchTable ?? buildDispatchTable(config, registry);

  const { scopes, fileDirectives } = collectDirectives(tree.root);
  const ancestors: SyntaxNode[] = [];
  const segments: string[] = [];
  const findings: Finding[] = [];
  const corrections: Correction[] = [];
  const ruleErrors: InternalRuleErrorDiagnostic[] = [];
  let inlineSuppressed = 0;

  const invoke = (rule: ActiveRule, node: SyntaxNode): void => {
    const context: RuleContext = {
      tree,
      ancestors,
      parameters: rule.config.parameters,
      semantic: tree.semantic,
    };
    const reported: ReportedSmell[] = [];
    const sink: FindingSink = {
      report: (smell) => {
        reported.push(smell);
      },
    };

    let created: Array<{ smell: ReportedSmell; finding: Finding }>;
    try {
      rule.descriptor.visit(node, sink, context);
      created = reported.map((smell) => ({
        smell,
        finding: createFinding(tree, file, rule, node, smell, segments),
      }));
    } catch (error) {
      // partial findings from a failed invocation are dropped
      ruleErrors.push(toRuleError(file, rule.descriptor.id, node, error));
      return;
    }

    for (const { smell, finding } of created) {
      // a node outside the tree falls back to the visited node's scope
      const inScope = scopes.get(smell.node) ?? scopes.get(node) ?? [];
      if (isSuppressed(finding, inScope) || isSuppressed(finding, fileDirectives)) {
        inlineSuppressed++;
        continue;
      }

      findings.push(finding);
      if (options.autoCorrect && rule.config.autoCorrect && rule.descriptor.autoCorrect) {
        try {
          const edits = rule.descriptor.autoCorrect(smell.node, context);
          if (edits.length > 0) {
            corrections.push({ file, ruleId: finding.ruleId, edits });
          }
        } catch (error) {
          ruleErrors.push(toRuleError(file, rule.descriptor.id, node, error));
        }
      }
    }
  };

  const visit = (node: SyntaxNode, segment: string): void => {
    segments.push(segment);

    for (const rule of table.get(node.kind) ?? []) {
      invoke(rule, node);
    }

    const children = childSegments(node.children);
    ancestors.push(node);
    node.children.forEach((child, index) => {
      visit(child, children[index] ?? child.kind);
    });
    ancestors.pop();

    segments.pop();
  };

  visit(tree.root, tree.root.kind);

  return { file, findings, ruleErrors, inlineSuppressed, corrections };
}

/**
 * Read every node's directives up front, so a finding is matched against the
 * scope of the node it reports, whether that node was visited yet or not.
 */
function collectDirectives(root: SyntaxNode): DirectiveIndex {
  const scopes = new Map<SyntaxNode, readonly SuppressionDirective[]>();
  const fileDirectives: SuppressionDirective[] = [];

  const walk = (node: SyntaxNode, inherited: readonly SuppressionDirective[]): void => {
    const own: SuppressionDirective[] = [];
    for (const directive of parseDirectives(node)) {
      if (directive.scope === 'file') {
        fileDirectives.push(directive);
      } else {
        own.push(directive);
      }
    }

    const scope = own.length > 0 ? [...inherited, ...own] : inherited;
    scopes.set(node, scope);
    for (const child of node.children) {
      walk(child, scope);
    }
  };

  walk(root, []);
  return { scopes, fileDirectives };
}

function createFinding(
  tree: SourceTree,
  file: string,
  rule: ActiveRule,
  visited: SyntaxNode,
  smell: ReportedSmell,
  segments: readonly string[]
): Finding {
  const target = smell.node;
  const path =
    target === visited
      ? segments
      : [...segments, target.name !== undefined ? `${target.kind}:${target.name}` : target.kind];
  const signature = entitySignature(file, path);

  return {
    ruleId: rule.descriptor.id,
    severity: rule.config.severity,
    location: {
      file,
      startLine: target.range.startLine,
      startColumn: target.range.startColumn,
      endLine: target.range.endLine,
      endColumn: target.range.endColumn,
    },
    message: smell.message,
    entitySignature: signature,
    fingerprint: computeFingerprint({
      ruleId: rule.descriptor.id,
      entitySignature: signature,
      snippet: nodeText(tree, target),
    }),
    debt: rule.descriptor.debt,
  };
}

function toRuleError(
  file: string,
  ruleId: string,
  node: SyntaxNode,
  error: unknown
): InternalRuleErrorDiagnostic {
  const diagnostic: InternalRuleErrorDiagnostic = {
    kind: 'internal-rule-error',
    file,
    ruleId,
    nodeKind: node.kind,
    line: node.range.startLine,
    message: errorMessage(error),
  };
  if (error instanceof Error && error.stack) {
    diagnostic.stack = error.stack;
  }
  return diagnostic;
}
