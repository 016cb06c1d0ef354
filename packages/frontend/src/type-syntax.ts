/**
 * The set of type syntax that can be spliced into the template.
 *
 * Caller-supplied key and value types are re-synthesized node by node before
 * they are spliced; anything outside this set is rejected up front.
 */

import * as ts from "typescript";

export const SPLICEABLE_TYPE_SYNTAX: ReadonlySet<ts.SyntaxKind> = new Set([
  // Names
  ts.SyntaxKind.TypeReference,
  ts.SyntaxKind.QualifiedName,
  ts.SyntaxKind.Identifier,
  // Keywords
  ts.SyntaxKind.AnyKeyword,
  ts.SyntaxKind.UnknownKeyword,
  ts.SyntaxKind.NumberKeyword,
  ts.SyntaxKind.BigIntKeyword,
  ts.SyntaxKind.BooleanKeyword,
  ts.SyntaxKind.StringKeyword,
  ts.SyntaxKind.SymbolKeyword,
  ts.SyntaxKind.ObjectKeyword,
  ts.SyntaxKind.UndefinedKeyword,
  ts.SyntaxKind.NeverKeyword,
  ts.SyntaxKind.VoidKeyword,
  // Literals
  ts.SyntaxKind.LiteralType,
  ts.SyntaxKind.StringLiteral,
  ts.SyntaxKind.NumericLiteral,
  ts.SyntaxKind.BigIntLiteral,
  ts.SyntaxKind.PrefixUnaryExpression,
  ts.SyntaxKind.TrueKeyword,
  ts.SyntaxKind.FalseKeyword,
  ts.SyntaxKind.NullKeyword,
  // Composite types
  ts.SyntaxKind.ArrayType,
  ts.SyntaxKind.TupleType,
  ts.SyntaxKind.NamedTupleMember,
  ts.SyntaxKind.OptionalType,
  ts.SyntaxKind.RestType,
  ts.SyntaxKind.UnionType,
  ts.SyntaxKind.IntersectionType,
  ts.SyntaxKind.ParenthesizedType,
  ts.SyntaxKind.TypeOperator,
  ts.SyntaxKind.IndexedAccessType,
  ts.SyntaxKind.TypeQuery,
  // Function types and their parameter lists
  ts.SyntaxKind.FunctionType,
  ts.SyntaxKind.ConstructorType,
  ts.SyntaxKind.Parameter,
  // Object types and their members
  ts.SyntaxKind.TypeLiteral,
  ts.SyntaxKind.PropertySignature,
  ts.SyntaxKind.MethodSignature,
  ts.SyntaxKind.IndexSignature,
  // Tokens and modifiers carried by the nodes above
  ts.SyntaxKind.QuestionToken,
  ts.SyntaxKind.DotDotDotToken,
  ts.SyntaxKind.ReadonlyKeyword,
]);

/**
 * First node under `node` (inclusive) whose kind is not spliceable.
 */
export const findUnsupportedTypeSyntax = (
  node: ts.Node
): ts.Node | undefined => {
  if (!SPLICEABLE_TYPE_SYNTAX.has(node.kind)) {
    return node;
  }
  if (
    ts.isParameter(node) &&
    (node.initializer !== undefined || !ts.isIdentifier(node.name))
  ) {
    return node;
  }
  if (
    ts.isPrefixUnaryExpression(node) &&
    (node.operator !== ts.SyntaxKind.MinusToken ||
      !(ts.isNumericLiteral(node.operand) || ts.isBigIntLiteral(node.operand)))
  ) {
    return node;
  }
  return ts.forEachChild(node, findUnsupportedTypeSyntax);
};
