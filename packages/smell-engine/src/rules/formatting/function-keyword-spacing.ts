/**
 * Checks the spacing after the `function` keyword. Auto-correctable.
 */

import type { RuleDescriptor } from '../rule.js';
import type { SourceTree, SyntaxNode } from '../../ast/types.js';
import { nodeText } from '../../ast/types.js';
import { FIVE_MINS, type TextEdit } from '../../types.js';

const KEYWORD_SPACING = /^((?:export\s+)?(?:default\s+)?(?:async\s+)?function)(\s{2,}|\t\s*)(?=[\w$*(])/;

function findBadSpacing(tree: SourceTree, node: SyntaxNode): TextEdit | undefined {
  const match = KEYWORD_SPACING.exec(nodeText(tree, node));
  if (!match?.[1] || !match[2]) {
    return undefined;
  }
  const start = node.range.start + match[1].length;
  return { start, end: start + match[2].length, replacement: ' ' };
}

export const functionKeywordSpacingRule: RuleDescriptor = {
  id: 'function-keyword-spacing',
  name: 'Function Keyword Spacing',
  description: 'Checks the spacing after the function keyword.',
  severity: 'style',
  debt: FIVE_MINS,
  defaultEnabled: true,
  requiresExtraContext: false,
  nodeInterest: ['FunctionDeclaration', 'FunctionExpression'],

  visit(node, sink, context) {
    if (findBadSpacing(context.tree, node)) {
      sink.report({
        node,
        message: "Unexpected spacing after 'function' keyword",
      });
    }
  },

  autoCorrect(node, context) {
    const edit = findBadSpacing(context.tree, node);
    return edit ? [edit] : [];
  },
};
