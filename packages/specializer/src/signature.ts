/**
 * Rebuild a function-like declaration with some of its parts replaced.
 */

import * as ts from "typescript";
import type { FunctionLikeDeclaration } from "./types.js";

export type SignatureParts = {
  readonly parameters?: readonly ts.ParameterDeclaration[];
  readonly type?: ts.TypeNode;
  readonly body?: ts.Block;
};

export const updateSignature = (
  factory: ts.NodeFactory,
  node: FunctionLikeDeclaration,
  parts: SignatureParts
): FunctionLikeDeclaration => {
  const parameters = parts.parameters ?? node.parameters;
  const type = parts.type ?? node.type;
  const body = parts.body ?? node.body;

  switch (node.kind) {
    case ts.SyntaxKind.FunctionDeclaration:
      return factory.updateFunctionDeclaration(
        node,
        node.modifiers,
        node.asteriskToken,
        node.name,
        node.typeParameters,
        parameters,
        type,
        body
      );
    case ts.SyntaxKind.MethodDeclaration:
      return factory.updateMethodDeclaration(
        node,
        node.modifiers,
        node.asteriskToken,
        node.name,
        node.questionToken,
        node.typeParameters,
        parameters,
        type,
        body
      );
    case ts.SyntaxKind.Constructor:
      return factory.updateConstructorDeclaration(
        node,
        node.modifiers,
        parameters,
        body
      );
  }
};

/**
 * Printable name of a function-like declaration, qualified by its class.
 */
export const describeFunction = (node: FunctionLikeDeclaration): string => {
  // Rebuilt nodes have no parent; their parse-tree original does.
  const parent: ts.Node | undefined = ts.getOriginalNode(node).parent;
  const owner =
    parent !== undefined && ts.isClassDeclaration(parent) && parent.name
      ? `${parent.name.text}.`
      : "";
  if (ts.isConstructorDeclaration(node)) {
    return `${owner}constructor`;
  }
  const name = node.name;
  if (name === undefined) {
    return "<anonymous function>";
  }
  return ts.isIdentifier(name) || ts.isPrivateIdentifier(name)
    ? `${owner}${name.text}`
    : `${owner}${ts.SyntaxKind[name.kind]}`;
};
