/**
 * Baseline - previously accepted findings, matched by fingerprint
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import type { Finding } from '../types.js';
import { BaselineFormatError } from '../errors.js';
import { compareStrings } from '../utils/ordering.js';

export const BASELINE_SCHEMA = 'smell-baseline/v1';

export type Baseline = ReadonlySet<string>;

export const EMPTY_BASELINE: Baseline = new Set<string>();

/**
 * `filter` hides baselined findings; `update` reports everything and
 * collects the fingerprints that will replace the baseline.
 */
export type BaselineMode = 'filter' | 'update';

export interface BaselineFilterResult {
  /** Findings not in the baseline; always reported */
  newlyIntroduced: Finding[];
  /** Findings hidden because the baseline accepted them */
  baselineSuppressed: Finding[];
  /** Every fingerprint seen, in update mode */
  fingerprints?: Set<string>;
}

export function filterAgainstBaseline(
  findings: readonly Finding[],
  baseline: Baseline,
  mode: BaselineMode = 'filter'
): BaselineFilterResult {
  if (mode === 'update') {
    return {
      newlyIntroduced: [...findings],
      baselineSuppressed: [],
      fingerprints: new Set(findings.map((finding) => finding.fingerprint)),
    };
  }

  const newlyIntroduced: Finding[] = [];
  const baselineSuppressed: Finding[] = [];
  for (const finding of findings) {
    if (baseline.has(finding.fingerprint)) {
      baselineSuppressed.push(finding);
    } else {
      newlyIntroduced.push(finding);
    }
  }
  return { newlyIntroduced, baselineSuppressed };
}

/**
 * Persistence for baselines. The engine only needs a set of strings.
 */
export interface BaselineStore {
  load(): Promise<Baseline>;
  save(fingerprints: Iterable<string>): Promise<void>;
}

const baselineFileSchema = z.object({
  schema: z.literal(BASELINE_SCHEMA),
  fingerprints: z.array(z.string()),
});

export type BaselineFile = z.infer<typeof baselineFileSchema>;

/**
 * Baseline kept as a sorted JSON list. A missing file is an empty baseline.
 */
export class JsonBaselineStore implements BaselineStore {
  readonly path: string;

  constructor(filePath: string) {
    this.path = resolve(filePath);
  }

  async load(): Promise<Baseline> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return EMPTY_BASELINE;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new BaselineFormatError(
        this.path,
        error instanceof Error ? error.message : String(error)
      );
    }

    const result = baselineFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new BaselineFormatError(this.path, `Expected schema "${BASELINE_SCHEMA}".`);
    }
    return new Set(result.data.fingerprints);
  }

  async save(fingerprints: Iterable<string>): Promise<void> {
    const file: BaselineFile = {
      schema: BASELINE_SCHEMA,
      fingerprints: Array.from(new Set(fingerprints)).sort(compareStrings),
    };
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(file, null, 2)}\n`, 'utf-8');
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
