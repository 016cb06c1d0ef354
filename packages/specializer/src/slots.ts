/**
 * Slot splitter.
 *
 * The template declares a shared key/value parameter slot as
 * `...[key, value]: [unknown, unknown]`. When key and value print the same
 * the slot keeps that single-slot form; otherwise it becomes two ordinary
 * parameters, the first key-typed and the second value-typed.
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
import { positionTree } from "./positions.js";
import type { SpecializationSession } from "./session.js";

type SlotShape = {
  readonly names: readonly [ts.Identifier, ts.Identifier];
  readonly types: readonly [ts.TypeNode, ts.TypeNode];
};

const identifierOf = (
  element: ts.ArrayBindingElement | undefined
): ts.Identifier | undefined =>
  element !== undefined &&
  ts.isBindingElement(element) &&
  element.dotDotDotToken === undefined &&
  element.initializer === undefined &&
  ts.isIdentifier(element.name)
    ? element.name
    : undefined;

const unnamedType = (
  element: ts.TypeNode | ts.NamedTupleMember | undefined
): ts.TypeNode | undefined =>
  element === undefined || ts.isNamedTupleMember(element) ? undefined : element;

/**
 * Recognize `...[a, b]: [A, B]`.
 */
export const readSlot = (
  parameter: ts.ParameterDeclaration
): SlotShape | undefined => {
  const { name, type } = parameter;
  if (
    parameter.dotDotDotToken === undefined ||
    !ts.isArrayBindingPattern(name) ||
    name.elements.length !== 2 ||
    type === undefined ||
    !ts.isTupleTypeNode(type) ||
    type.elements.length !== 2
  ) {
    return undefined;
  }

  const first = identifierOf(name.elements[0]);
  const second = identifierOf(name.elements[1]);
  const firstType = unnamedType(type.elements[0]);
  const secondType = unnamedType(type.elements[1]);
  if (
    first === undefined ||
    second === undefined ||
    firstType === undefined ||
    secondType === undefined
  ) {
    return undefined;
  }
  return { names: [first, second], types: [firstType, secondType] };
};

/**
 * Specialize a parameter list whose first parameter is a shared key/value
 * slot. Parameters after the slot are left untouched.
 */
export const splitSlot = (
  session: SpecializationSession,
  parameters: readonly ts.ParameterDeclaration[],
  owner: string
): Result<readonly ts.ParameterDeclaration[], Diagnostic> => {
  const [slot, ...rest] = parameters;
  const shape = slot === undefined ? undefined : readSlot(slot);
  if (slot === undefined || shape === undefined) {
    return error(
      createDiagnostic(
        "MMP2005",
        "error",
        `\`${owner}\` must take a shared key/value slot as its first parameter`,
        slot === undefined ? undefined : locationOf(ts.getOriginalNode(slot)),
        "Declare it as `...[key, value]: [unknown, unknown]`"
      )
    );
  }

  if (session.keysMatchValues) {
    return ok([session.substituteKey(slot), ...rest]);
  }

  const { factory } = session;
  const roles = ["key", "value"] as const;
  const split = roles.map((role, index) =>
    positionTree(
      factory.createParameterDeclaration(
        undefined,
        undefined,
        factory.createIdentifier(shape.names[index].text),
        undefined,
        session.substituteType(shape.types[index], role)
      ),
      shape.names[index]
    )
  );
  return ok([...split, ...rest]);
};
