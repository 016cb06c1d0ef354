/**
 * Declaration dispatcher - routes each top-level statement of the template,
 * and each member of its classes, to the handler registered for its name.
 */

import * as ts from "typescript";
import {
  createDiagnostic,
  locationOf,
  ok,
  error,
  flatMap,
  map,
  traverse,
  type Diagnostic,
  type Result,
} from "@monomap/frontend";
import type { DeclarationRegistry, HandlerTable } from "./registry.js";
import type { SpecializationSession } from "./session.js";
import type { ExhaustivenessValidator } from "./validator.js";

export type DispatchContext = {
  readonly session: SpecializationSession;
  readonly registry: DeclarationRegistry;
  readonly validator: ExhaustivenessValidator;
};

const unrecognized = <T>(
  context: DispatchContext,
  kind: string,
  name: string,
  node: ts.Node
): Result<T, Diagnostic> =>
  error(
    context.validator.abort(
      createDiagnostic(
        "MMP2001",
        "error",
        `unrecognized ${kind} declaration \`${name}\``,
        locationOf(node)
      )
    )
  );

const dispatchTo = <T extends ts.Node>(
  context: DispatchContext,
  table: HandlerTable<T>,
  name: string,
  node: T
): Result<T, Diagnostic> => {
  const taken = table.take(name);
  switch (taken.kind) {
    case "unrecognized":
      return unrecognized(context, table.category, name, node);
    case "duplicate":
      return error(
        context.validator.abort(
          createDiagnostic(
            "MMP2004",
            "error",
            `${table.category} declaration \`${name}\` is declared more than once`,
            locationOf(node)
          )
        )
      );
    case "matched": {
      context.validator.consumed();
      const result = taken.handler(node, context.session);
      if (!result.ok) {
        context.validator.abort(result.error);
      }
      return result;
    }
  }
};

const memberName = (member: ts.ClassElement): string | undefined => {
  if (ts.isConstructorDeclaration(member)) {
    return "constructor";
  }
  const name = member.name;
  return name !== undefined &&
    (ts.isIdentifier(name) || ts.isPrivateIdentifier(name))
    ? name.text
    : undefined;
};

const dispatchMember = (
  context: DispatchContext,
  className: string,
  member: ts.ClassElement
): Result<ts.ClassElement, Diagnostic> => {
  // Property types belong to the class's own handler.
  if (ts.isPropertyDeclaration(member)) {
    return ok(member);
  }

  const name = memberName(member);
  if (
    name === undefined ||
    !(ts.isMethodDeclaration(member) || ts.isConstructorDeclaration(member))
  ) {
    return unrecognized(
      context,
      "class member",
      `${className}.${name ?? ts.SyntaxKind[member.kind]}`,
      member
    );
  }

  return flatMap(
    dispatchTo(
      context,
      context.registry.functions,
      `${className}.${name}`,
      member
    ),
    (specialized): Result<ts.ClassElement, Diagnostic> => {
      if (
        !ts.isMethodDeclaration(specialized) &&
        !ts.isConstructorDeclaration(specialized)
      ) {
        throw new Error(
          `ICE: handler for ${className}.${name} returned ${ts.SyntaxKind[specialized.kind]}`
        );
      }
      return ok(specialized);
    }
  );
};

const dispatchClass = (
  context: DispatchContext,
  declaration: ts.ClassDeclaration
): Result<ts.Statement, Diagnostic> => {
  const className = declaration.name?.text;
  if (className === undefined) {
    return unrecognized(context, "type", "<anonymous class>", declaration);
  }

  return flatMap(
    dispatchTo(context, context.registry.types, className, declaration),
    (specialized): Result<ts.Statement, Diagnostic> => {
      if (!ts.isClassDeclaration(specialized)) {
        throw new Error(
          `ICE: handler for class ${className} returned ${ts.SyntaxKind[specialized.kind]}`
        );
      }
      return map(
        traverse(specialized.members, (member) =>
          dispatchMember(context, className, member)
        ),
        (members) =>
          context.session.factory.updateClassDeclaration(
            specialized,
            specialized.modifiers,
            specialized.name,
            specialized.typeParameters,
            specialized.heritageClauses,
            members
          )
      );
    }
  );
};

const dispatchValues = (
  context: DispatchContext,
  statement: ts.VariableStatement
): Result<ts.Statement, Diagnostic> => {
  const [first, ...others] = statement.declarationList.declarations;
  if (first === undefined || !ts.isIdentifier(first.name)) {
    return unrecognized(context, "value", "<destructuring>", statement);
  }

  const name = first.name.text;
  return flatMap(
    dispatchTo(context, context.registry.values, name, statement),
    (specialized): Result<ts.Statement, Diagnostic> => {
      // One binding per statement, so every value has its own handler.
      if (others.length > 0) {
        return error(
          context.validator.abort(
            createDiagnostic(
              "MMP2003",
              "error",
              `value declaration \`${name}\` declares ${others.length + 1} bindings`,
              locationOf(statement),
              "Declare each template value in its own statement"
            )
          )
        );
      }
      return ok(specialized);
    }
  );
};

/**
 * Dispatch one top-level template statement.
 */
export const dispatchStatement = (
  context: DispatchContext,
  statement: ts.Statement
): Result<ts.Statement, Diagnostic> => {
  if (ts.isImportDeclaration(statement)) {
    return ok(statement);
  }
  if (ts.isClassDeclaration(statement)) {
    return dispatchClass(context, statement);
  }
  if (ts.isFunctionDeclaration(statement)) {
    const name = statement.name?.text;
    if (name === undefined) {
      return unrecognized(context, "function", "<anonymous function>", statement);
    }
    return flatMap(
      dispatchTo(context, context.registry.functions, name, statement),
      (specialized): Result<ts.Statement, Diagnostic> => {
        if (!ts.isFunctionDeclaration(specialized)) {
          throw new Error(
            `ICE: handler for function ${name} returned ${ts.SyntaxKind[specialized.kind]}`
          );
        }
        return ok(specialized);
      }
    );
  }
  if (
    ts.isInterfaceDeclaration(statement) ||
    ts.isTypeAliasDeclaration(statement)
  ) {
    return dispatchTo(
      context,
      context.registry.types,
      statement.name.text,
      statement
    );
  }
  if (ts.isVariableStatement(statement)) {
    return dispatchValues(context, statement);
  }
  return unrecognized(context, "top-level", ts.SyntaxKind[statement.kind], statement);
};

/**
 * Dispatch every statement of `sourceFile` in order, stopping at the first
 * failure.
 */
export const dispatchDeclarations = (
  context: DispatchContext,
  sourceFile: ts.SourceFile
): Result<readonly ts.Statement[], Diagnostic> =>
  traverse(sourceFile.statements, (statement) =>
    dispatchStatement(context, statement)
  );
