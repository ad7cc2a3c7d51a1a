import { describe, it, expect } from 'vitest';
import { applyTextEdits } from '../text-edits.js';

describe('applyTextEdits', () => {
  it('applies edits given in any order against the original offsets', () => {
    const result = applyTextEdits('function  a() {}\nfunction   b() {}', [
      { start: 25, end: 28, replacement: ' ' },
      { start: 8, end: 10, replacement: ' ' },
    ]);

    expect(result).toEqual({ text: 'function a() {}\nfunction b() {}', applied: 2, skipped: 0 });
  });

  it('skips edits overlapping an accepted one', () => {
    const result = applyTextEdits('abcdef', [
      { start: 1, end: 4, replacement: 'X' },
      { start: 3, end: 5, replacement: 'Y' },
    ]);

    expect(result).toEqual({ text: 'aXef', applied: 1, skipped: 1 });
  });

  it('allows adjacent edits and insertions', () => {
    const result = applyTextEdits('abc', [
      { start: 0, end: 0, replacement: '>' },
      { start: 0, end: 1, replacement: 'A' },
      { start: 1, end: 2, replacement: 'B' },
    ]);

    expect(result).toEqual({ text: '>ABc', applied: 3, skipped: 0 });
  });

  it('skips edits outside the text or with inverted ranges', () => {
    const result = applyTextEdits('abc', [
      { start: 2, end: 1, replacement: 'x' },
      { start: 2, end: 9, replacement: 'y' },
    ]);

    expect(result).toEqual({ text: 'abc', applied: 0, skipped: 2 });
  });
});
