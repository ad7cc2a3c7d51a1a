/**
 * Rule interface and context
 */

import type { z } from 'zod';
import type { SemanticContext, SourceTree, SyntaxNode } from '../ast/types.js';
import type { Debt, Severity, TextEdit } from '../types.js';

/**
 * Context provided to a rule for each visited node
 */
export interface RuleContext {
  /** Tree being analyzed */
  tree: SourceTree;
  /** Ancestors of the visited node, root first. Only valid during the call. */
  ancestors: readonly SyntaxNode[];
  /** Resolved parameters for this rule */
  parameters: Readonly<Record<string, unknown>>;
  /** Present only when the provider supplied semantic information */
  semantic?: SemanticContext;
}

export interface ReportedSmell {
  node: SyntaxNode;
  message: string;
}

/**
 * Collects findings raised by one rule invocation
 */
export interface FindingSink {
  report(smell: ReportedSmell): void;
}

/**
 * Rule descriptor
 */
export interface RuleDescriptor {
  /** Unique rule ID */
  readonly id: string;
  /** Human-readable name */
  readonly name: string;
  /** Description of what the rule checks */
  readonly description: string;
  /** Default severity */
  readonly severity: Severity;
  readonly debt: Debt;
  readonly defaultEnabled: boolean;
  /** Needs type information, not just syntax */
  readonly requiresExtraContext: boolean;
  /** Node kinds this rule visits */
  readonly nodeInterest: readonly string[];
  /** Schema for the rule's parameters; configured values are validated against it */
  readonly parameters?: z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;
  visit(node: SyntaxNode, sink: FindingSink, context: RuleContext): void;
  /** Edits that fix a reported node, for auto-correctable rules */
  autoCorrect?(node: SyntaxNode, context: RuleContext): TextEdit[];
}

/**
 * Rule configuration after all layers are merged
 */
export interface RuleConfiguration {
  enabled: boolean;
  severity: Severity;
  parameters: Readonly<Record<string, unknown>>;
  autoCorrect: boolean;
}
