/**
 * Handlers for the map template, one per declaration.
 *
 * Each handler states which placeholders belong to the key and which to the
 * value. Adding a declaration to the template without adding a handler here
 * fails generation, and so does removing one.
 */

import * as ts from "typescript";
import {
  createDiagnostic,
  locationOf,
  ok,
  error,
  flatMap,
  map,
  type Diagnostic,
  type Result,
} from "@monomap/frontend";
import { DeclarationRegistry, HandlerTable } from "./registry.js";
import { rewriteSentinel } from "./sentinel.js";
import type { SpecializationSession } from "./session.js";
import { describeFunction, updateSignature } from "./signature.js";
import { splitSlot } from "./slots.js";
import type {
  DeclarationHandler,
  FunctionLikeDeclaration,
  TypeDeclaration,
  ValueDeclaration,
  ValueRole,
} from "./types.js";

type FunctionHandler = DeclarationHandler<FunctionLikeDeclaration>;

/**
 * Leave the declaration as written.
 */
const nop = <T extends ts.Node>(node: T): Result<T, Diagnostic> => ok(node);

/**
 * Substitute every placeholder in the declaration.
 */
const whole =
  (role: ValueRole) =>
  <T extends ts.Node>(
    node: T,
    session: SpecializationSession
  ): Result<T, Diagnostic> =>
    ok(session.substitute(node, role));

const substituteResult = (
  session: SpecializationSession,
  fn: FunctionLikeDeclaration,
  role: ValueRole | undefined
): ts.TypeNode | undefined =>
  role === undefined || fn.type === undefined
    ? undefined
    : session.substituteType(fn.type, role);

/**
 * Substitute placeholders in the parameter list and the return type
 * separately.
 */
const signature =
  (parameterRole: ValueRole, resultRole: ValueRole): FunctionHandler =>
  (fn, session) =>
    ok(
      updateSignature(session.factory, fn, {
        parameters: fn.parameters.map((parameter) =>
          session.substitute(parameter, parameterRole)
        ),
        type: substituteResult(session, fn, resultRole),
      })
    );

/**
 * Run `handler`, then rewrite the absence sentinel.
 */
const withSentinel =
  (handler: FunctionHandler): FunctionHandler =>
  (fn, session) =>
    flatMap(handler(fn, session), (specialized) =>
      rewriteSentinel(session, specialized)
    );

/**
 * Split the shared key/value slot leading the parameter list.
 */
const slotted =
  (result: ValueRole | undefined): FunctionHandler =>
  (fn, session) =>
    map(
      splitSlot(session, fn.parameters, describeFunction(fn)),
      (parameters) =>
        updateSignature(session.factory, fn, {
          parameters,
          type: substituteResult(session, fn, result),
        })
    );

/**
 * Split the key/value slot of the callback that is the first parameter.
 */
const slottedCallback: FunctionHandler = (fn, session) => {
  const [callback, ...rest] = fn.parameters;
  const callbackType = callback?.type;
  if (
    callback === undefined ||
    callbackType === undefined ||
    !ts.isFunctionTypeNode(callbackType)
  ) {
    return error(
      createDiagnostic(
        "MMP2005",
        "error",
        `\`${describeFunction(fn)}\` must take a callback as its first parameter`,
        locationOf(ts.getOriginalNode(fn))
      )
    );
  }

  const { factory } = session;
  return map(
    splitSlot(
      session,
      callbackType.parameters,
      `${describeFunction(fn)} callback`
    ),
    (parameters) => {
      const specializedType = factory.updateFunctionTypeNode(
        callbackType,
        callbackType.typeParameters,
        factory.createNodeArray(parameters),
        callbackType.type
      );
      const specializedCallback = factory.updateParameterDeclaration(
        callback,
        callback.modifiers,
        callback.dotDotDotToken,
        callback.name,
        callback.questionToken,
        specializedType,
        callback.initializer
      );
      return updateSignature(factory, fn, {
        parameters: [specializedCallback, ...rest],
      });
    }
  );
};

/**
 * Substitute placeholders in the class's property declarations only; its
 * methods are dispatched on their own.
 */
const properties =
  (role: ValueRole): DeclarationHandler<TypeDeclaration> =>
  (declaration, session) => {
    if (!ts.isClassDeclaration(declaration)) {
      return error(
        createDiagnostic(
          "MMP2005",
          "error",
          `\`${declaration.name.text}\` must be a class`,
          locationOf(declaration)
        )
      );
    }
    return ok(
      session.factory.updateClassDeclaration(
        declaration,
        declaration.modifiers,
        declaration.name,
        declaration.typeParameters,
        declaration.heritageClauses,
        declaration.members.map((member) =>
          ts.isPropertyDeclaration(member)
            ? session.substitute(member, role)
            : member
        )
      )
    );
  };

const FUNCTION_HANDLERS: Readonly<Record<string, FunctionHandler>> = {
  "SyncMap.load": withSentinel(signature("key", "value")),
  "SyncMap.store": slotted(undefined),
  "SyncMap.loadOrStore": slotted("value"),
  "SyncMap.delete": whole("key"),
  "SyncMap.range": slottedCallback,
  "SyncMap.missLocked": nop,
  "SyncMap.dirtyLocked": whole("key"),
  "Entry.constructor": whole("value"),
  "Entry.load": withSentinel(whole("value")),
  "Entry.tryStore": whole("value"),
  "Entry.unexpungeLocked": nop,
  "Entry.storeLocked": whole("value"),
  "Entry.tryLoadOrStore": withSentinel(whole("value")),
  "Entry.delete": nop,
  "Entry.tryExpungeLocked": nop,
  newEntry: whole("value"),
};

const TYPE_HANDLERS: Readonly<
  Record<string, DeclarationHandler<TypeDeclaration>>
> = {
  ReadOnly: whole("key"),
  SyncMap: properties("key"),
  Entry: properties("value"),
};

const VALUE_HANDLERS: Readonly<
  Record<string, DeclarationHandler<ValueDeclaration>>
> = {
  expunged: nop,
};

/**
 * A fresh registry for the map template. Registries are consumed by a run,
 * so each run needs its own.
 */
export const createSyncMapRegistry = (): DeclarationRegistry =>
  new DeclarationRegistry(
    new HandlerTable("function", FUNCTION_HANDLERS),
    new HandlerTable("type", TYPE_HANDLERS),
    new HandlerTable("value", VALUE_HANDLERS)
  );
