/**
 * TypeScript AST provider - builds engine syntax trees with the compiler API
 */

import ts from 'typescript';
import { resolve } from 'node:path';
import type {
  AstProvider,
  ParseOutcome,
  SemanticContext,
  SourceRange,
  SyntaxNode,
} from '../ast/types.js';
import { getLeadingComments } from './comment-analyzer.js';

export interface TypeScriptProviderOptions {
  /**
   * Build a full program with type information. When false the program is
   * syntax-only and rules needing extra context are degraded.
   */
  semantic?: boolean;
  compilerOptions?: ts.CompilerOptions;
  /** In-memory file contents, keyed by absolute path */
  sources?: ReadonlyMap<string, string>;
}

const SEMANTIC_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ES2022,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  allowJs: true,
  strict: true,
  esModuleInterop: true,
  skipLibCheck: true,
  noEmit: true,
};

const SYNTAX_ONLY_OPTIONS: ts.CompilerOptions = {
  ...SEMANTIC_OPTIONS,
  noResolve: true,
  noLib: true,
  types: [],
};

const KIND_NAMES = new Map<number, string>();
for (const [name, value] of Object.entries(ts.SyntaxKind)) {
  // marker aliases (FirstStatement, LastToken, ...) are declared after the real names
  if (typeof value === 'number' && !KIND_NAMES.has(value)) {
    KIND_NAMES.set(value, name);
  }
}

export function kindName(kind: ts.SyntaxKind): string {
  return KIND_NAMES.get(kind) ?? `Unknown${kind}`;
}

function isNamedDeclaration(node: ts.Node): node is ts.NamedDeclaration {
  return (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isClassDeclaration(node) ||
    ts.isClassExpression(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isTypeAliasDeclaration(node) ||
    ts.isEnumDeclaration(node) ||
    ts.isEnumMember(node) ||
    ts.isModuleDeclaration(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isMethodSignature(node) ||
    ts.isPropertyDeclaration(node) ||
    ts.isPropertySignature(node) ||
    ts.isPropertyAssignment(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node) ||
    ts.isVariableDeclaration(node) ||
    ts.isParameter(node)
  );
}

function declaredName(node: ts.Node): string | undefined {
  if (!isNamedDeclaration(node)) {
    return undefined;
  }
  const name = ts.getNameOfDeclaration(node);
  if (
    name &&
    (ts.isIdentifier(name) ||
      ts.isPrivateIdentifier(name) ||
      ts.isStringLiteral(name) ||
      ts.isNumericLiteral(name))
  ) {
    return name.text;
  }
  return undefined;
}

/**
 * Provider over one compiler program spanning all files of a module
 */
export class TypeScriptAstProvider implements AstProvider {
  readonly hasSemanticContext: boolean;
  private program: ts.Program;
  private checker: ts.TypeChecker | undefined;

  constructor(filePaths: readonly string[], options: TypeScriptProviderOptions = {}) {
    this.hasSemanticContext = options.semantic !== false;
    const compilerOptions: ts.CompilerOptions = {
      ...(this.hasSemanticContext ? SEMANTIC_OPTIONS : SYNTAX_ONLY_OPTIONS),
      ...options.compilerOptions,
    };

    const host = ts.createCompilerHost(compilerOptions, true);
    const sources = options.sources;
    if (sources) {
      const readFile = host.readFile.bind(host);
      const fileExists = host.fileExists.bind(host);
      const getSourceFile = host.getSourceFile.bind(host);
      host.readFile = (fileName) => sources.get(fileName) ?? readFile(fileName);
      host.fileExists = (fileName) => sources.has(fileName) || fileExists(fileName);
      host.getSourceFile = (fileName, languageVersion, onError, shouldCreate) => {
        const text = sources.get(fileName);
        return text !== undefined
          ? ts.createSourceFile(fileName, text, languageVersion, true)
          : getSourceFile(fileName, languageVersion, onError, shouldCreate);
      };
    }

    this.program = ts.createProgram(
      filePaths.map((filePath) => resolve(filePath)),
      compilerOptions,
      host
    );
    this.checker = this.hasSemanticContext ? this.program.getTypeChecker() : undefined;
  }

  /**
   * Parse a single file
   */
  async parse(filePath: string, signal?: AbortSignal): Promise<ParseOutcome> {
    if (signal?.aborted) {
      return { ok: false, failure: { filePath, message: 'Parsing aborted' } };
    }

    const sourceFile = this.program.getSourceFile(resolve(filePath));
    if (!sourceFile) {
      return {
        ok: false,
        failure: { filePath, message: `Could not load source file: ${filePath}` },
      };
    }

    const syntaxErrors = this.program.getSyntacticDiagnostics(sourceFile);
    const firstError = syntaxErrors[0];
    if (firstError) {
      const failure = {
        filePath,
        message: ts.flattenDiagnosticMessageText(firstError.messageText, '\n'),
      };
      if (firstError.start === undefined) {
        return { ok: false, failure };
      }
      const { line, character } = sourceFile.getLineAndCharacterOfPosition(firstError.start);
      return { ok: false, failure: { ...failure, line: line + 1, column: character } };
    }

    const natives = new WeakMap<SyntaxNode, ts.Node>();
    const root = this.convert(sourceFile, sourceFile, new Set(), natives);

    let semantic: SemanticContext | undefined;
    if (this.checker) {
      semantic = {
        typeChecker: this.checker,
        nativeNode: (node) => natives.get(node),
      };
    }

    return {
      ok: true,
      tree: { filePath, text: sourceFile.getFullText(), root, semantic },
    };
  }

  /**
   * Get Program for advanced analysis
   */
  getProgram(): ts.Program {
    return this.program;
  }

  private convert(
    node: ts.Node,
    sourceFile: ts.SourceFile,
    seenComments: Set<number>,
    natives: WeakMap<SyntaxNode, ts.Node>
  ): SyntaxNode {
    // file-level comments belong to the first statement, not the whole file
    const comments = ts.isSourceFile(node)
      ? []
      : getLeadingComments(node, sourceFile, seenComments);

    const kids: ts.Node[] = [];
    ts.forEachChild(node, (child) => {
      kids.push(child);
    });
    kids.sort((a, b) => a.pos - b.pos);

    const syntaxNode: SyntaxNode = {
      kind: kindName(node.kind),
      children: kids.map((child) => this.convert(child, sourceFile, seenComments, natives)),
      range: rangeOf(node, sourceFile),
      comments,
    };
    const name = declaredName(node);
    if (name !== undefined) {
      syntaxNode.name = name;
    }

    natives.set(syntaxNode, node);
    return syntaxNode;
  }
}

function rangeOf(node: ts.Node, sourceFile: ts.SourceFile): SourceRange {
  const start = ts.isSourceFile(node) ? 0 : node.getStart(sourceFile);
  const end = node.getEnd();
  const startPosition = sourceFile.getLineAndCharacterOfPosition(start);
  const endPosition = sourceFile.getLineAndCharacterOfPosition(end);

  return {
    startLine: startPosition.line + 1, // Convert to 1-indexed
    startColumn: startPosition.character,
    endLine: endPosition.line + 1,
    endColumn: endPosition.character,
    start,
    end,
  };
}
