/**
 * Type-expression resolver - reads the key and value types out of a mapping
 * type literal such as `Map<string, number>`.
 */

import * as ts from "typescript";
import { createSourceFile, describeSyntaxError, getSyntaxErrors } from "./parser.js";
import { findUnsupportedTypeSyntax } from "./type-syntax.js";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import { ok, error, flatMap, type Result } from "./types/result.js";

/**
 * A caller-supplied type, parsed on its own.
 *
 * `text` is the printed (normalized) form; `node` belongs to a private source
 * file and must be re-synthesized before it is spliced anywhere.
 */
export type TypeExpression = {
  readonly text: string;
  readonly node: ts.TypeNode;
};

export type MappingTypeArguments = {
  readonly key: TypeExpression;
  readonly value: TypeExpression;
};

/**
 * Generic types accepted as "mapping from K to V".
 */
export const MAPPING_TYPE_NAMES: readonly string[] = [
  "Map",
  "ReadonlyMap",
  "Record",
];

const MAPPING_HINT = "Expected a mapping type such as Map<string, number>";

const ALIAS_NAME = "__Expression";

const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });

/**
 * Parse `text` as a standalone type.
 */
export const parseTypeExpression = (
  text: string,
  role: string
): Result<TypeExpression, Diagnostic> => {
  const sourceFile = createSourceFile(
    `${role}.ts`,
    `type ${ALIAS_NAME} = ${text};\n`
  );

  const [syntaxError] = getSyntaxErrors(sourceFile);
  if (syntaxError !== undefined) {
    return error(
      createDiagnostic(
        "MMP1002",
        "error",
        `${role} \`${text}\` does not parse as a type: ${describeSyntaxError(syntaxError)}`
      )
    );
  }

  const [statement, ...trailing] = sourceFile.statements;
  if (
    statement === undefined ||
    trailing.length > 0 ||
    !ts.isTypeAliasDeclaration(statement) ||
    statement.typeParameters !== undefined
  ) {
    return error(
      createDiagnostic(
        "MMP1002",
        "error",
        `${role} \`${text}\` is not a single closed type expression`
      )
    );
  }

  return ok({
    text: printer.printNode(ts.EmitHint.Unspecified, statement.type, sourceFile),
    node: statement.type,
  });
};

/**
 * Re-parse one type argument of the mapping literal as its own expression,
 * rejecting syntax the specializer cannot splice.
 */
const resolveArgument = (
  argument: ts.TypeNode,
  role: "key" | "value"
): Result<TypeExpression, Diagnostic> => {
  const printed = printer.printNode(
    ts.EmitHint.Unspecified,
    argument,
    argument.getSourceFile()
  );

  return flatMap(
    parseTypeExpression(printed, `${role} type`),
    (expression): Result<TypeExpression, Diagnostic> => {
      const unsupported = findUnsupportedTypeSyntax(expression.node);
      if (unsupported === undefined) {
        return ok(expression);
      }
      return error(
        createDiagnostic(
          "MMP1003",
          "error",
          `${role} type \`${expression.text}\` uses unsupported type syntax (${ts.SyntaxKind[unsupported.kind]})`,
          undefined,
          "Declare a named type alias for it and pass the alias name instead"
        )
      );
    }
  );
};

/**
 * Resolve the key and value types of a mapping type literal.
 */
export const resolveMappingType = (
  literal: string
): Result<MappingTypeArguments, Diagnostic> => {
  const trimmed = literal.trim();
  if (trimmed === "") {
    return error(
      createDiagnostic(
        "MMP1001",
        "error",
        "invalid argument: empty type literal",
        undefined,
        MAPPING_HINT
      )
    );
  }

  return flatMap(
    parseTypeExpression(trimmed, "type literal"),
    (mapping): Result<MappingTypeArguments, Diagnostic> => {
      const node = mapping.node;
      if (
        ts.isTypeReferenceNode(node) &&
        node.typeArguments?.hasTrailingComma === true
      ) {
        return error(
          createDiagnostic(
            "MMP1002",
            "error",
            `type literal \`${trimmed}\` does not parse as a type: type argument expected`,
            undefined,
            MAPPING_HINT
          )
        );
      }

      if (
        !ts.isTypeReferenceNode(node) ||
        !ts.isIdentifier(node.typeName) ||
        !MAPPING_TYPE_NAMES.includes(node.typeName.text) ||
        node.typeArguments === undefined ||
        node.typeArguments.length !== 2
      ) {
        return error(
          createDiagnostic(
            "MMP1001",
            "error",
            `invalid argument \`${mapping.text}\`: not a mapping type`,
            undefined,
            MAPPING_HINT
          )
        );
      }

      const [keyNode, valueNode] = node.typeArguments;
      return flatMap(resolveArgument(keyNode, "key"), (key) =>
        flatMap(resolveArgument(valueNode, "value"), (value) =>
          ok<MappingTypeArguments, Diagnostic>({ key, value })
        )
      );
    }
  );
};
