/**
 * Position synthesis for spliced and handler-built nodes.
 *
 * The printer reads identifier and literal text from a node's source file
 * whenever the node carries a real text range. Caller-supplied types live in
 * their own source file, so they are rebuilt node by node with synthesized
 * ranges instead of being moved into the template tree. Every rebuilt node
 * is given the source-map range of the template node it replaces, which
 * keeps the whole output tree positioned.
 */

import * as ts from "typescript";

const anchorRange = (anchor: ts.Node): ts.SourceMapRange => {
  const range = ts.getSourceMapRange(anchor);
  return { pos: range.pos, end: range.end };
};

/**
 * True when the node has a parsed text range or a source-map range.
 */
export const hasPosition = (node: ts.Node): boolean =>
  node.pos >= 0 || ts.getSourceMapRange(node).pos >= 0;

/**
 * Give a synthesized node the position of `anchor`.
 */
export const positionAt = <T extends ts.Node>(node: T, anchor: ts.Node): T =>
  ts.setSourceMapRange(node, anchorRange(anchor));

/**
 * Position `node` and every descendant that has no position yet.
 */
export const positionTree = <T extends ts.Node>(
  node: T,
  anchor: ts.Node
): T => {
  const range = anchorRange(anchor);
  const visit = (current: ts.Node): void => {
    if (!hasPosition(current)) {
      ts.setSourceMapRange(current, range);
    }
    ts.forEachChild(current, visit);
  };
  visit(node);
  return node;
};

const unsupported = (node: ts.Node): never => {
  throw new Error(
    `ICE: ${ts.SyntaxKind[node.kind]} reached the type synthesizer - the frontend should have rejected it`
  );
};

/**
 * Rebuild a type expression with factory nodes positioned at `anchor`.
 *
 * Only the kinds in SPLICEABLE_TYPE_SYNTAX are handled.
 */
export const synthesizeType = (
  factory: ts.NodeFactory,
  node: ts.TypeNode,
  anchor: ts.Node
): ts.TypeNode => {
  const range = anchorRange(anchor);
  const at = <T extends ts.Node>(created: T): T =>
    ts.setSourceMapRange(created, range);

  const identifier = (name: ts.Identifier): ts.Identifier =>
    at(factory.createIdentifier(name.text));

  const entityName = (name: ts.EntityName): ts.EntityName =>
    ts.isIdentifier(name)
      ? identifier(name)
      : at(
          factory.createQualifiedName(
            entityName(name.left),
            identifier(name.right)
          )
        );

  const token = <
    K extends ts.SyntaxKind.QuestionToken | ts.SyntaxKind.DotDotDotToken,
  >(
    kind: K,
    present: ts.Node | undefined
  ): ts.PunctuationToken<K> | undefined =>
    present === undefined ? undefined : at(factory.createToken(kind));

  const readonlyModifiers = (
    modifiers: ts.NodeArray<ts.ModifierLike> | undefined
  ): ts.Modifier[] | undefined =>
    modifiers?.map((modifier) =>
      modifier.kind === ts.SyntaxKind.ReadonlyKeyword
        ? at(factory.createModifier(ts.SyntaxKind.ReadonlyKeyword))
        : unsupported(modifier)
    );

  const propertyName = (name: ts.PropertyName): ts.PropertyName => {
    if (ts.isIdentifier(name)) {
      return identifier(name);
    }
    if (ts.isStringLiteral(name)) {
      return at(factory.createStringLiteral(name.text));
    }
    if (ts.isNumericLiteral(name)) {
      return at(factory.createNumericLiteral(name.text));
    }
    return unsupported(name);
  };

  const literal = (
    value: ts.LiteralTypeNode["literal"]
  ): ts.LiteralTypeNode["literal"] => {
    switch (value.kind) {
      case ts.SyntaxKind.TrueKeyword:
        return at(factory.createTrue());
      case ts.SyntaxKind.FalseKeyword:
        return at(factory.createFalse());
      case ts.SyntaxKind.NullKeyword:
        return at(factory.createNull());
    }
    if (ts.isStringLiteral(value)) {
      return at(factory.createStringLiteral(value.text));
    }
    if (ts.isNumericLiteral(value)) {
      return at(factory.createNumericLiteral(value.text));
    }
    if (ts.isBigIntLiteral(value)) {
      return at(factory.createBigIntLiteral(value.text));
    }
    if (ts.isPrefixUnaryExpression(value)) {
      const operand = value.operand;
      if (ts.isNumericLiteral(operand)) {
        return at(
          factory.createPrefixUnaryExpression(
            value.operator,
            at(factory.createNumericLiteral(operand.text))
          )
        );
      }
      if (ts.isBigIntLiteral(operand)) {
        return at(
          factory.createPrefixUnaryExpression(
            value.operator,
            at(factory.createBigIntLiteral(operand.text))
          )
        );
      }
    }
    return unsupported(value);
  };

  const parameter = (
    declaration: ts.ParameterDeclaration
  ): ts.ParameterDeclaration => {
    if (!ts.isIdentifier(declaration.name) || declaration.initializer) {
      return unsupported(declaration);
    }
    return at(
      factory.createParameterDeclaration(
        undefined,
        token(ts.SyntaxKind.DotDotDotToken, declaration.dotDotDotToken),
        identifier(declaration.name),
        token(ts.SyntaxKind.QuestionToken, declaration.questionToken),
        declaration.type ? type(declaration.type) : undefined
      )
    );
  };

  const member = (element: ts.TypeElement): ts.TypeElement => {
    if (ts.isPropertySignature(element)) {
      return at(
        factory.createPropertySignature(
          readonlyModifiers(element.modifiers),
          propertyName(element.name),
          token(ts.SyntaxKind.QuestionToken, element.questionToken),
          element.type ? type(element.type) : undefined
        )
      );
    }
    if (ts.isMethodSignature(element) && !element.typeParameters) {
      return at(
        factory.createMethodSignature(
          undefined,
          propertyName(element.name),
          token(ts.SyntaxKind.QuestionToken, element.questionToken),
          undefined,
          element.parameters.map(parameter),
          element.type ? type(element.type) : undefined
        )
      );
    }
    if (ts.isIndexSignatureDeclaration(element)) {
      return at(
        factory.createIndexSignature(
          readonlyModifiers(element.modifiers),
          element.parameters.map(parameter),
          type(element.type)
        )
      );
    }
    return unsupported(element);
  };

  const type = (current: ts.TypeNode): ts.TypeNode => {
    const kind = current.kind;
    switch (kind) {
      case ts.SyntaxKind.AnyKeyword:
      case ts.SyntaxKind.UnknownKeyword:
      case ts.SyntaxKind.NumberKeyword:
      case ts.SyntaxKind.BigIntKeyword:
      case ts.SyntaxKind.BooleanKeyword:
      case ts.SyntaxKind.StringKeyword:
      case ts.SyntaxKind.SymbolKeyword:
      case ts.SyntaxKind.ObjectKeyword:
      case ts.SyntaxKind.UndefinedKeyword:
      case ts.SyntaxKind.NeverKeyword:
      case ts.SyntaxKind.VoidKeyword:
        return at(factory.createKeywordTypeNode(kind));
    }

    if (ts.isTypeReferenceNode(current)) {
      return at(
        factory.createTypeReferenceNode(
          entityName(current.typeName),
          current.typeArguments?.map(type)
        )
      );
    }
    if (ts.isLiteralTypeNode(current)) {
      return at(factory.createLiteralTypeNode(literal(current.literal)));
    }
    if (ts.isArrayTypeNode(current)) {
      return at(factory.createArrayTypeNode(type(current.elementType)));
    }
    if (ts.isTupleTypeNode(current)) {
      return at(
        factory.createTupleTypeNode(
          current.elements.map((element) =>
            ts.isNamedTupleMember(element)
              ? at(
                  factory.createNamedTupleMember(
                    token(ts.SyntaxKind.DotDotDotToken, element.dotDotDotToken),
                    identifier(element.name),
                    token(ts.SyntaxKind.QuestionToken, element.questionToken),
                    type(element.type)
                  )
                )
              : type(element)
          )
        )
      );
    }
    if (ts.isOptionalTypeNode(current)) {
      return at(factory.createOptionalTypeNode(type(current.type)));
    }
    if (ts.isRestTypeNode(current)) {
      return at(factory.createRestTypeNode(type(current.type)));
    }
    if (ts.isUnionTypeNode(current)) {
      return at(factory.createUnionTypeNode(current.types.map(type)));
    }
    if (ts.isIntersectionTypeNode(current)) {
      return at(factory.createIntersectionTypeNode(current.types.map(type)));
    }
    if (ts.isParenthesizedTypeNode(current)) {
      return at(factory.createParenthesizedType(type(current.type)));
    }
    if (ts.isTypeOperatorNode(current)) {
      return at(
        factory.createTypeOperatorNode(current.operator, type(current.type))
      );
    }
    if (ts.isIndexedAccessTypeNode(current)) {
      return at(
        factory.createIndexedAccessTypeNode(
          type(current.objectType),
          type(current.indexType)
        )
      );
    }
    if (ts.isTypeQueryNode(current)) {
      return at(
        factory.createTypeQueryNode(
          entityName(current.exprName),
          current.typeArguments?.map(type)
        )
      );
    }
    if (ts.isFunctionTypeNode(current) && !current.typeParameters) {
      return at(
        factory.createFunctionTypeNode(
          undefined,
          current.parameters.map(parameter),
          type(current.type)
        )
      );
    }
    if (
      ts.isConstructorTypeNode(current) &&
      !current.typeParameters &&
      !current.modifiers
    ) {
      return at(
        factory.createConstructorTypeNode(
          undefined,
          undefined,
          current.parameters.map(parameter),
          type(current.type)
        )
      );
    }
    if (ts.isTypeLiteralNode(current)) {
      return at(factory.createTypeLiteralNode(current.members.map(member)));
    }
    return unsupported(current);
  };

  return type(node);
};
