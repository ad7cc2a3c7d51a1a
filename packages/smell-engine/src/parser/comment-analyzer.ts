/**
 * Comment analyzer - leading comments of compiler nodes
 */

import ts from 'typescript';

/**
 * Get the leading comments for a node.
 *
 * `seen` holds comment start offsets already handed out. Nested nodes share
 * their full start with the outermost one, so in a pre-order walk each
 * comment lands on the outermost node it precedes.
 */
export function getLeadingComments(
  node: ts.Node,
  sourceFile: ts.SourceFile,
  seen: Set<number> = new Set()
): string[] {
  const text = sourceFile.getFullText();
  const comments: string[] = [];

  const ranges = ts.getLeadingCommentRanges(text, node.getFullStart());
  if (!ranges) {
    return comments;
  }

  for (const range of ranges) {
    if (seen.has(range.pos)) {
      continue;
    }
    seen.add(range.pos);
    comments.push(text.slice(range.pos, range.end).trim());
  }

  return comments;
}
