import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { analyzeProject } from '../project-scanner.js';
import { BaselineFormatError, ConfigLoadError } from '../../errors.js';

describe('analyzeProject', () => {
  let moduleDir: string;

  beforeEach(() => {
    moduleDir = mkdtempSync(join(tmpdir(), 'smell-engine-project-'));
    mkdirSync(join(moduleDir, 'src'));
    mkdirSync(join(moduleDir, 'dist'));
    writeFileSync(join(moduleDir, 'src', 'a.ts'), 'function  stub() {}\n');
    writeFileSync(join(moduleDir, 'src', 'b.ts'), 'const x = ;\n');
    writeFileSync(join(moduleDir, 'dist', 'out.js'), 'function  built() {}\n');
    writeFileSync(
      join(moduleDir, 'smell.config.json'),
      JSON.stringify({ rules: { 'function-keyword-spacing': { severity: 'warning' } } })
    );
  });

  afterEach(() => {
    rmSync(moduleDir, { recursive: true, force: true });
  });

  it('analyzes a module directory end to end', async () => {
    const { result, errors, metadata } = await analyzeProject(moduleDir, {
      module: 'app',
      semantic: false,
    });

    expect(errors).toEqual([]);
    expect(result.module).toBe('app');
    expect(
      result.findings.map((f) => [f.ruleId, f.severity, f.location.file, f.location.startLine, f.location.startColumn])
    ).toEqual([
      ['function-keyword-spacing', 'warning', 'src/a.ts', 1, 0],
      ['no-empty-block', 'style', 'src/a.ts', 1, 17],
    ]);
    expect(result.diagnostics).toEqual([
      { kind: 'parse-failure', file: 'src/b.ts', message: 'Expression expected.', line: 1, column: 10 },
    ]);
    expect(result.summary.filesExcluded).toBe(1);
    expect(result.summary.filesAnalyzed).toBe(1);
    expect(result.notes).toEqual([
      {
        kind: 'rule-degraded',
        ruleId: 'single-method-object-literal',
        message:
          "Rule 'single-method-object-literal' needs type information and was disabled because none is available.",
      },
    ]);
    expect(result.passed).toBe(true);
    expect(metadata.engineVersion).toBe('0.1.0');
    expect(metadata.filesDiscovered).toBe(3);
    expect(metadata.configSources).toEqual([join(moduleDir, 'smell.config.json')]);
  });

  it('applies the failure policy from config and options', async () => {
    writeFileSync(join(moduleDir, 'smell.config.json'), JSON.stringify({ maxIssues: 1 }));

    const fromConfig = await analyzeProject(moduleDir, { semantic: false });
    expect(fromConfig.result.passed).toBe(false);

    const overridden = await analyzeProject(moduleDir, {
      semantic: false,
      policy: { maxIssues: 5 },
    });
    expect(overridden.result.passed).toBe(true);
  });

  it('writes a baseline and hides its findings on the next run', async () => {
    const update = await analyzeProject(moduleDir, { semantic: false, updateBaseline: true });
    const baselineFile = join(moduleDir, 'smell-baseline.json');

    expect(update.result.findings).toHaveLength(2);
    expect(JSON.parse(readFileSync(baselineFile, 'utf-8'))).toEqual({
      schema: 'smell-baseline/v1',
      fingerprints: update.result.baselineUpdate,
    });

    const rerun = await analyzeProject(moduleDir, { semantic: false });
    expect(rerun.result.findings).toEqual([]);
    expect(rerun.result.summary.baselineSuppressed).toBe(2);

    writeFileSync(join(moduleDir, 'src', 'a.ts'), 'function  stub() {}\nfunction other() {}\n');
    const afterEdit = await analyzeProject(moduleDir, { semantic: false });
    expect(afterEdit.result.findings.map((f) => [f.ruleId, f.location.startLine])).toEqual([
      ['no-empty-block', 2],
    ]);
  });

  it('reads the baseline named in config', async () => {
    writeFileSync(
      join(moduleDir, 'smell.config.json'),
      JSON.stringify({ baseline: 'quality/baseline.json' })
    );

    await analyzeProject(moduleDir, { semantic: false, updateBaseline: true });

    expect(existsSync(join(moduleDir, 'quality', 'baseline.json'))).toBe(true);
    expect(existsSync(join(moduleDir, 'smell-baseline.json'))).toBe(false);
  });

  describe('baseline write failures', () => {
    beforeEach(() => {
      // a file where the baseline directory would go
      writeFileSync(join(moduleDir, 'blocked'), 'not a directory');
    });

    it('throws by default', async () => {
      await expect(
        analyzeProject(moduleDir, {
          semantic: false,
          updateBaseline: true,
          baselinePath: 'blocked/baseline.json',
        })
      ).rejects.toThrow();
    });

    it('keeps the result and collects the error when throwOnError is false', async () => {
      const { result, errors } = await analyzeProject(moduleDir, {
        semantic: false,
        updateBaseline: true,
        baselinePath: 'blocked/baseline.json',
        throwOnError: false,
      });

      expect(errors.map((error) => error.file)).toEqual(['baseline-writing']);
      expect(result.findings).toHaveLength(2);
      expect(result.baselineUpdate).toHaveLength(2);
    });
  });

  describe('setup failures', () => {
    it('throws by default', async () => {
      writeFileSync(join(moduleDir, 'smell.config.json'), JSON.stringify({ failFast: 'yes' }));

      await expect(analyzeProject(moduleDir, { semantic: false })).rejects.toBeInstanceOf(
        ConfigLoadError
      );
    });

    it('collects config errors when throwOnError is false', async () => {
      writeFileSync(join(moduleDir, 'smell.config.json'), JSON.stringify({ failFast: 'yes' }));

      const { result, errors } = await analyzeProject(moduleDir, {
        module: 'app',
        semantic: false,
        throwOnError: false,
      });

      expect(errors).toHaveLength(1);
      expect(errors[0]?.file).toBe('config-loading');
      expect(errors[0]?.message).toContain('Failed to load config from');
      expect(result.findings).toEqual([]);
      expect(result.module).toBe('app');
    });

    it('reports a missing module directory', async () => {
      const missing = join(moduleDir, 'nope');

      const { errors } = await analyzeProject(missing, { throwOnError: false });

      expect(errors.map((error) => [error.file, error.message])).toEqual([
        ['file-discovery', `Module directory does not exist: ${missing}`],
      ]);
    });

    it('rejects a malformed baseline', async () => {
      writeFileSync(join(moduleDir, 'smell-baseline.json'), JSON.stringify({ fingerprints: [] }));

      await expect(analyzeProject(moduleDir, { semantic: false })).rejects.toBeInstanceOf(
        BaselineFormatError
      );

      const { errors } = await analyzeProject(moduleDir, { semantic: false, throwOnError: false });
      expect(errors[0]?.file).toBe('baseline-loading');
    });
  });
});
