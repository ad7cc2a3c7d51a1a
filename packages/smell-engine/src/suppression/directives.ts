/**
 * Inline suppression directives
 *
 *   // @smell-ignore no-empty-block, function-keyword-spacing
 *   // @smell-ignore all: generated code
 *   // @smell-ignore-file no-empty-block kept until the parser rewrite
 *
 * Ids are comma separated on the directive's line; the first word not joined
 * by a comma starts the free-form reason.
 *
 * A node directive covers the node carrying the comment and its whole
 * subtree. A file directive covers the file. Suppression is cumulative: any
 * directive in scope that names the rule (or `all`) suppresses it.
 */

import type { SyntaxNode } from '../ast/types.js';
import type { Finding } from '../types.js';

const DIRECTIVE_REGEX = /@smell-ignore(-file)?[ \t]+([a-z0-9/-]+(?:[ \t]*,[ \t]*[a-z0-9/-]+)*)/gi;

export type SuppressedRules = 'all' | ReadonlySet<string>;

export type SuppressionDirective =
  | { scope: 'node'; ruleIds: SuppressedRules; node: SyntaxNode }
  | { scope: 'file'; ruleIds: SuppressedRules };

export function parseDirectives(node: SyntaxNode): SuppressionDirective[] {
  const directives: SuppressionDirective[] = [];

  for (const comment of node.comments) {
    for (const match of comment.matchAll(DIRECTIVE_REGEX)) {
      const ids = (match[2] ?? '')
        .split(/[ \t]*,[ \t]*/)
        .map((id) => id.toLowerCase())
        .filter((id) => id.length > 0);
      if (ids.length === 0) {
        continue;
      }

      const ruleIds: SuppressedRules = ids.includes('all') ? 'all' : new Set(ids);
      directives.push(
        match[1] ? { scope: 'file', ruleIds } : { scope: 'node', ruleIds, node }
      );
    }
  }

  return directives;
}

export function suppresses(directive: SuppressionDirective, ruleId: string): boolean {
  return directive.ruleIds === 'all' || directive.ruleIds.has(ruleId.toLowerCase());
}

/**
 * True if any directive in scope names the finding's rule or `all`
 */
export function isSuppressed(
  finding: Pick<Finding, 'ruleId'>,
  directivesInScope: readonly SuppressionDirective[]
): boolean {
  return directivesInScope.some((directive) => suppresses(directive, finding.ruleId));
}
