/**
 * Single Method Object Literal Rule
 *
 * An object literal that does nothing but implement the single method of its
 * target interface can be replaced by a function once the interface becomes a
 * function type.
 *
 * Noncompliant:
 *   const listener: Listener = { handle(event) { log(event); } };
 *
 * Compliant:
 *   const listener: Listener = (event) => log(event);
 */

import ts from 'typescript';
import type { RuleDescriptor } from '../rule.js';
import type { SyntaxNode } from '../../ast/types.js';
import { FIVE_MINS } from '../../types.js';

function containsThisReference(node: SyntaxNode): boolean {
  if (node.kind === 'ThisKeyword') {
    return true;
  }
  return node.children.some(containsThisReference);
}

export const singleMethodObjectLiteralRule: RuleDescriptor = {
  id: 'single-method-object-literal',
  name: 'Single Method Object Literal',
  description: 'Report object literals that can be changed to functions.',
  severity: 'style',
  debt: FIVE_MINS,
  defaultEnabled: true,
  requiresExtraContext: true,
  nodeInterest: ['ObjectLiteralExpression'],

  visit(node, sink, context) {
    const semantic = context.semantic;
    if (!semantic) {
      return;
    }

    const members = node.children;
    const method = members[0];
    if (members.length !== 1 || method?.kind !== 'MethodDeclaration') {
      return;
    }
    if (containsThisReference(method)) {
      return;
    }

    const native = semantic.nativeNode(node);
    if (!native || !ts.isObjectLiteralExpression(native)) {
      return;
    }

    const checker = semantic.typeChecker;
    const contextualType = checker.getContextualType(native);
    if (!contextualType || contextualType.getCallSignatures().length > 0) {
      return;
    }

    const properties = contextualType.getProperties();
    const single = properties[0];
    if (properties.length !== 1 || !single) {
      return;
    }

    const memberType = checker.getTypeOfSymbolAtLocation(single, native);
    if (memberType.getCallSignatures().length !== 1) {
      return;
    }

    sink.report({
      node,
      message: `Object literal only implements '${single.getName()}' and can be a function.`,
    });
  },
};
