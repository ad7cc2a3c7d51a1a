import { describe, it, expect } from 'vitest';
import { analyzeSource } from '../../../__tests__/helpers/source.js';

const fixture = `function a() {}
function b() {
  // explained
}
try {
  a();
} catch {
}
`;

const emptyBlocks = async (text: string, parameters?: Record<string, unknown>) => {
  const analysis = await analyzeSource(text, {
    layers: parameters ? [{ rules: { 'no-empty-block': { parameters } } }] : [],
  });
  return analysis.findings.filter((finding) => finding.ruleId === 'no-empty-block');
};

describe('no-empty-block', () => {
  it('should flag empty blocks without comments', async () => {
    const findings = await emptyBlocks(fixture);

    expect(findings.map((finding) => finding.location)).toEqual([
      { file: 'sample.ts', startLine: 1, startColumn: 13, endLine: 1, endColumn: 15 },
      { file: 'sample.ts', startLine: 7, startColumn: 8, endLine: 8, endColumn: 1 },
    ]);
    expect(findings[0]?.message).toBe('This empty block of code can be removed.');
    expect(findings[0]?.severity).toBe('style');
    expect(findings[0]?.debt).toEqual({ days: 0, hours: 0, mins: 5 });
  });

  it('should allow empty catch blocks when configured', async () => {
    const findings = await emptyBlocks(fixture, { allowEmptyCatch: true });

    expect(findings.map((finding) => finding.location.startLine)).toEqual([1]);
  });

  it('should not flag blocks with statements', async () => {
    const findings = await emptyBlocks('if (Math.random()) {\n  console.log(1);\n}\n');

    expect(findings).toEqual([]);
  });

  it('should respect inline suppression', async () => {
    const findings = await emptyBlocks(
      '// @smell-ignore no-empty-block\nfunction stub() {}\nfunction other() {}\n'
    );

    expect(findings.map((finding) => finding.location.startLine)).toEqual([3]);
  });

  it('should keep fingerprints when unrelated code is inserted above', async () => {
    const [before] = await emptyBlocks('function stub() {}\n');
    const [after] = await emptyBlocks('const added = 1;\n\n\nfunction stub() {}\n');

    expect(after?.location.startLine).toBe(4);
    expect(after?.fingerprint).toBe(before?.fingerprint);
  });
});
