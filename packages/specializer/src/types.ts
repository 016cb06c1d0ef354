/**
 * Specialization types
 */

import type * as ts from "typescript";
import type { Diagnostic, Result, TypeExpression } from "@monomap/frontend";
import type { SpecializationSession } from "./session.js";

/**
 * Which caller-supplied type a placeholder stands for.
 */
export type ValueRole = "key" | "value";

/**
 * What to specialize the template to.
 */
export type SpecializationTarget = {
  readonly key: TypeExpression;
  readonly value: TypeExpression;
  /** Name given to the map class; other template symbols derive from it */
  readonly name: string;
};

export type FunctionLikeDeclaration =
  | ts.FunctionDeclaration
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration;

export type TypeDeclaration =
  | ts.ClassDeclaration
  | ts.InterfaceDeclaration
  | ts.TypeAliasDeclaration;

export type ValueDeclaration = ts.VariableStatement;

/**
 * Rewrites one template declaration. Handlers build new nodes and never
 * mutate the node they are given.
 */
export type DeclarationHandler<T extends ts.Node> = (
  node: T,
  session: SpecializationSession
) => Result<T, Diagnostic>;

export type DeclarationCategory = "function" | "type" | "value";
