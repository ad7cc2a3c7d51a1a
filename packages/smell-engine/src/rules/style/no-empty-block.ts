/**
 * No Empty Block Rule
 *
 * Reports blocks that contain neither statements nor comments.
 */

import { z } from 'zod';
import type { RuleDescriptor } from '../rule.js';
import { nodeText } from '../../ast/types.js';
import { FIVE_MINS } from '../../types.js';

const parametersSchema = z.object({
  allowEmptyCatch: z.boolean().optional().default(false),
});

export const noEmptyBlockRule: RuleDescriptor = {
  id: 'no-empty-block',
  name: 'Empty Block',
  description: 'Empty blocks of code serve no purpose and should be removed or documented',
  severity: 'style',
  debt: FIVE_MINS,
  defaultEnabled: true,
  requiresExtraContext: false,
  nodeInterest: ['Block'],
  parameters: parametersSchema,

  visit(node, sink, context) {
    if (node.children.length > 0) {
      return;
    }

    // `{` and `}` excluded; anything left besides whitespace is a comment
    const inner = nodeText(context.tree, node).slice(1, -1);
    if (inner.trim().length > 0) {
      return;
    }

    const options = parametersSchema.parse(context.parameters);
    const parent = context.ancestors[context.ancestors.length - 1];
    if (options.allowEmptyCatch && parent?.kind === 'CatchClause') {
      return;
    }

    sink.report({
      node,
      message: 'This empty block of code can be removed.',
    });
  },
};
