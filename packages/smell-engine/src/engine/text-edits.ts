/**
 * Applying auto-correct edits to file text
 */

import type { TextEdit } from '../types.js';

export interface AppliedEdits {
  text: string;
  applied: number;
  /** Edits dropped because they overlap an earlier one */
  skipped: number;
}

/**
 * Apply edits against the original text. Edits are taken in start order; one
 * that overlaps an already accepted edit is skipped.
 */
export function applyTextEdits(text: string, edits: readonly TextEdit[]): AppliedEdits {
  const ordered = [...edits].sort((a, b) => a.start - b.start || a.end - b.end);
  const accepted: TextEdit[] = [];
  let skipped = 0;
  let lastEnd = -1;

  for (const edit of ordered) {
    if (edit.start < lastEnd || edit.start > edit.end || edit.end > text.length) {
      skipped++;
      continue;
    }
    accepted.push(edit);
    lastEnd = edit.end;
  }

  let result = text;
  for (let i = accepted.length - 1; i >= 0; i--) {
    const edit = accepted[i];
    if (!edit) continue;
    result = result.slice(0, edit.start) + edit.replacement + result.slice(edit.end);
  }

  return { text: result, applied: accepted.length, skipped };
}
