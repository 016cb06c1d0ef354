/**
 * Absence-sentinel rewriting.
 *
 * Template functions report a missing value as `[undefined, false]`. Once the
 * value type is concrete, `undefined` is no longer assignable to it, so each
 * sentinel returned in the result position is replaced by a reference to a
 * definitely-assigned result slot named after the result's tuple label:
 *
 *   load(): [value: V, ok: boolean] {
 *     let value!: V;
 *     ...
 *     return [value, false];
 *   }
 */

import * as ts from "typescript";
import {
  createDiagnostic,
  locationOf,
  ok,
  error,
  type Diagnostic,
  type Result,
} from "@monomap/frontend";
import { positionAt, positionTree } from "./positions.js";
import type { SpecializationSession } from "./session.js";
import { describeFunction, updateSignature } from "./signature.js";
import type { FunctionLikeDeclaration } from "./types.js";

export const SENTINEL_NAME = "undefined";

const isSentinel = (node: ts.Node): node is ts.Identifier =>
  ts.isIdentifier(node) && node.text === SENTINEL_NAME;

/**
 * True when `undefined` is already a valid value of `type`.
 */
export const acceptsSentinel = (type: ts.TypeNode): boolean => {
  switch (type.kind) {
    case ts.SyntaxKind.UnknownKeyword:
    case ts.SyntaxKind.AnyKeyword:
    case ts.SyntaxKind.UndefinedKeyword:
    case ts.SyntaxKind.VoidKeyword:
      return true;
  }
  if (ts.isUnionTypeNode(type)) {
    return type.types.some(acceptsSentinel);
  }
  if (ts.isParenthesizedTypeNode(type)) {
    return acceptsSentinel(type.type);
  }
  return false;
};

/**
 * True when `name` is bound anywhere under `node`.
 */
const bindsName = (node: ts.Node, name: string): boolean => {
  if (
    (ts.isVariableDeclaration(node) ||
      ts.isParameter(node) ||
      ts.isBindingElement(node) ||
      ts.isFunctionDeclaration(node) ||
      ts.isClassDeclaration(node)) &&
    node.name !== undefined &&
    ts.isIdentifier(node.name) &&
    node.name.text === name
  ) {
    return true;
  }
  return (
    ts.forEachChild(node, (child) => bindsName(child, name) || undefined) ??
    false
  );
};

const resultMember = (
  fn: FunctionLikeDeclaration
): ts.NamedTupleMember | undefined => {
  const type = fn.type;
  if (type === undefined || !ts.isTupleTypeNode(type)) {
    return undefined;
  }
  const [first] = type.elements;
  return first !== undefined && ts.isNamedTupleMember(first)
    ? first
    : undefined;
};

const shapeError = (
  fn: FunctionLikeDeclaration,
  message: string,
  hint?: string
): Result<FunctionLikeDeclaration, Diagnostic> =>
  error(
    createDiagnostic(
      "MMP2005",
      "error",
      `\`${describeFunction(fn)}\` ${message}`,
      locationOf(ts.getOriginalNode(fn)),
      hint
    )
  );

/**
 * Replace `undefined` in the result position of every return in `fn`.
 *
 * Only direct return operands are rewritten: the returned expression itself
 * or the first element of a returned array literal. Nested functions and
 * classes are not entered. Nothing changes when the value type accepts
 * `undefined`.
 */
export const rewriteSentinel = (
  session: SpecializationSession,
  fn: FunctionLikeDeclaration
): Result<FunctionLikeDeclaration, Diagnostic> => {
  if (acceptsSentinel(session.target.value.node)) {
    return ok(fn);
  }

  const member = resultMember(fn);
  if (member === undefined) {
    return shapeError(
      fn,
      "must return a labelled tuple whose first member is the result",
      "Declare the return type as `[value: unknown, ok: boolean]`"
    );
  }
  if (session.roleOf(member.type) !== "value") {
    return shapeError(fn, `result \`${member.name.text}\` is not value-typed`);
  }
  const body = fn.body;
  if (body === undefined) {
    return shapeError(fn, "has no body");
  }

  const slotName = member.name.text;
  if (
    bindsName(body, slotName) ||
    fn.parameters.some((parameter) => bindsName(parameter, slotName))
  ) {
    return shapeError(
      fn,
      `already binds \`${slotName}\`, the name of its result`
    );
  }

  const { factory } = session;
  let rewritten = 0;
  const slotReference = (sentinel: ts.Identifier): ts.Identifier => {
    rewritten++;
    return positionAt(factory.createIdentifier(slotName), sentinel);
  };

  const rewriteOperand = (expression: ts.Expression): ts.Expression => {
    if (isSentinel(expression)) {
      return slotReference(expression);
    }
    if (ts.isArrayLiteralExpression(expression)) {
      return factory.updateArrayLiteralExpression(
        expression,
        expression.elements.map((element, index) =>
          index === 0 && isSentinel(element) ? slotReference(element) : element
        )
      );
    }
    return expression;
  };

  const visit = (node: ts.Node): ts.Node => {
    if (ts.isFunctionLike(node) || ts.isClassLike(node)) {
      return node;
    }
    if (ts.isReturnStatement(node)) {
      return node.expression === undefined
        ? node
        : factory.updateReturnStatement(node, rewriteOperand(node.expression));
    }
    return session.visitChildren(node, visit);
  };

  const visited = session.visitChildren(body, visit);
  if (rewritten === 0) {
    return ok(fn);
  }

  const slot = positionTree(
    factory.createVariableStatement(
      undefined,
      factory.createVariableDeclarationList(
        [
          factory.createVariableDeclaration(
            factory.createIdentifier(slotName),
            factory.createToken(ts.SyntaxKind.ExclamationToken),
            session.splice("value", member.name)
          ),
        ],
        ts.NodeFlags.Let
      )
    ),
    member.name
  );

  return ok(
    updateSignature(factory, fn, {
      body: factory.updateBlock(visited, [slot, ...visited.statements]),
    })
  );
};
