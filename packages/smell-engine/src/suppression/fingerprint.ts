/**
 * Stable identity for findings.
 *
 * A fingerprint depends on the rule, the structural path to the offending node
 * and its whitespace-free text. Line numbers never take part, so edits
 * elsewhere in the file leave it unchanged.
 */

import { createHash } from 'node:crypto';
import type { SyntaxNode } from '../ast/types.js';

export interface FingerprintInput {
  ruleId: string;
  entitySignature: string;
  snippet: string;
}

export function normalizeSnippet(snippet: string): string {
  return snippet.replace(/\s+/g, '');
}

export function computeFingerprint(input: FingerprintInput): string {
  return createHash('sha256')
    .update(input.ruleId)
    .update('\0')
    .update(input.entitySignature)
    .update('\0')
    .update(normalizeSnippet(input.snippet))
    .digest('hex');
}

/**
 * Path segments for the children of one node.
 *
 * Named nodes are `Kind:name` (with `#n` for repeated names), unnamed ones are
 * `Kind#n`, n counting earlier siblings with the same key. Inserting a
 * differently named or differently kinded sibling does not shift anyone.
 */
export function childSegments(children: readonly SyntaxNode[]): string[] {
  const counts = new Map<string, number>();

  return children.map((child) => {
    const key = child.name !== undefined ? `${child.kind}:${child.name}` : child.kind;
    const index = counts.get(key) ?? 0;
    counts.set(key, index + 1);

    if (child.name !== undefined) {
      return index === 0 ? key : `${key}#${index}`;
    }
    return `${key}#${index}`;
  });
}

export function entitySignature(file: string, segments: readonly string[]): string {
  return `${file}#${segments.join('/')}`;
}
