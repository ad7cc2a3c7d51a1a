/**
 * Syntax tree contract consumed by the engine. Producing it is the job of an
 * AstProvider; the engine never parses text itself.
 */

import type ts from 'typescript';

export interface SourceRange {
  /** 1-indexed */
  startLine: number;
  /** 0-indexed */
  startColumn: number;
  /** 1-indexed */
  endLine: number;
  /** 0-indexed */
  endColumn: number;
  /** Offset of the first character in the file text */
  start: number;
  /** Offset just past the last character */
  end: number;
}

export interface SyntaxNode {
  kind: string;
  /** Children in source order */
  children: readonly SyntaxNode[];
  range: SourceRange;
  /** Comment text attached to this node (leading comments) */
  comments: readonly string[];
  /** Declared identifier, for named declarations */
  name?: string;
}

/**
 * Semantic information available when the provider built a full program
 */
export interface SemanticContext {
  typeChecker: ts.TypeChecker;
  /** Maps an engine node back to the compiler node it was built from */
  nativeNode(node: SyntaxNode): ts.Node | undefined;
}

export interface SourceTree {
  filePath: string;
  text: string;
  root: SyntaxNode;
  semantic?: SemanticContext;
}

export interface ParseFailure {
  filePath: string;
  message: string;
  line?: number;
  column?: number;
}

export type ParseOutcome =
  | { ok: true; tree: SourceTree }
  | { ok: false; failure: ParseFailure };

export interface AstProvider {
  /** Whether trees carry a SemanticContext; false means degraded mode */
  readonly hasSemanticContext: boolean;
  parse(filePath: string, signal?: AbortSignal): Promise<ParseOutcome>;
}

export function nodeText(tree: SourceTree, node: SyntaxNode): string {
  return tree.text.slice(node.range.start, node.range.end);
}
