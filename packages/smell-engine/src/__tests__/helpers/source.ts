import { TypeScriptAstProvider } from '../../parser/typescript-provider.js';
import { resolve } from '../../config/resolver.js';
import type { ConfigLayer } from '../../config/schema.js';
import { createBuiltinRegistry } from '../../rules/registry.js';
import { analyzeFile, type FileAnalysis } from '../../engine/traversal.js';

export const SOURCE_FILE = '/virtual/project/sample.ts';

export interface AnalyzeSourceOptions {
  semantic?: boolean;
  layers?: ConfigLayer[];
  autoCorrect?: boolean;
}

/**
 * Parse `text` with the TypeScript provider and run the built-in rules on it
 */
export async function analyzeSource(
  text: string,
  options: AnalyzeSourceOptions = {}
): Promise<FileAnalysis> {
  const provider = new TypeScriptAstProvider([SOURCE_FILE], {
    semantic: options.semantic ?? false,
    sources: new Map([[SOURCE_FILE, text]]),
  });
  const outcome = await provider.parse(SOURCE_FILE);
  if (!outcome.ok) {
    throw new Error(`Fixture does not parse: ${outcome.failure.message}`);
  }

  const registry = createBuiltinRegistry();
  const config = resolve(options.layers ?? [], registry, {
    semanticContextAvailable: provider.hasSemanticContext,
  });

  return analyzeFile(outcome.tree, config, registry, {
    displayPath: 'sample.ts',
    autoCorrect: options.autoCorrect,
  });
}
