/**
 * Renamer - gives the template's top-level symbols names derived from the
 * requested class name.
 */

import * as ts from "typescript";
import {
  createDiagnostic,
  ok,
  error,
  type Diagnostic,
  type Result,
} from "@monomap/frontend";
import { positionAt } from "./positions.js";

export type SymbolRenameMap = ReadonlyMap<string, string>;

/**
 * Template symbol names.
 */
export const TEMPLATE_SYMBOLS = {
  map: "SyncMap",
  entry: "Entry",
  readOnly: "ReadOnly",
  expunged: "expunged",
  newEntry: "newEntry",
} as const;

const isIdentifierName = (name: string): boolean => {
  const [first, ...rest] = Array.from(name, (char) => char.codePointAt(0));
  return (
    first !== undefined &&
    ts.isIdentifierStart(first, ts.ScriptTarget.Latest) &&
    rest.every(
      (code) =>
        code !== undefined && ts.isIdentifierPart(code, ts.ScriptTarget.Latest)
    )
  );
};

/**
 * Check that `name` can name a class.
 */
export const validateClassName = (name: string): Result<string, Diagnostic> => {
  if (
    isIdentifierName(name) &&
    ts.identifierToKeywordKind(ts.factory.createIdentifier(name)) === undefined
  ) {
    return ok(name);
  }
  return error(
    createDiagnostic(
      "MMP1004",
      "error",
      `invalid name \`${name}\`: not a valid class name`,
      undefined,
      "Use an identifier that is not a reserved word, such as IntMap"
    )
  );
};

/**
 * Map each template symbol to its specialized name.
 *
 * @example
 * buildRenameMap("intMap").get("Entry") // "IntMapEntry"
 */
export const buildRenameMap = (name: string): SymbolRenameMap => {
  const title = name.charAt(0).toUpperCase() + name.slice(1);
  return new Map<string, string>([
    [TEMPLATE_SYMBOLS.map, name],
    [TEMPLATE_SYMBOLS.entry, `${title}Entry`],
    [TEMPLATE_SYMBOLS.readOnly, `${title}ReadOnly`],
    [TEMPLATE_SYMBOLS.expunged, `expunged${title}`],
    [TEMPLATE_SYMBOLS.newEntry, `new${title}Entry`],
  ]);
};

/**
 * True when `node` names a member rather than referencing a binding.
 */
const isMemberName = (node: ts.Identifier, parent: ts.Node): boolean => {
  if (ts.isPropertyAccessExpression(parent)) {
    return parent.name === node;
  }
  if (ts.isQualifiedName(parent)) {
    return parent.right === node;
  }
  if (ts.isBindingElement(parent)) {
    return parent.propertyName === node;
  }
  if (
    ts.isPropertyDeclaration(parent) ||
    ts.isMethodDeclaration(parent) ||
    ts.isPropertySignature(parent) ||
    ts.isMethodSignature(parent) ||
    ts.isPropertyAssignment(parent) ||
    ts.isGetAccessorDeclaration(parent) ||
    ts.isSetAccessorDeclaration(parent) ||
    ts.isEnumMember(parent)
  ) {
    return parent.name === node;
  }
  return false;
};

/**
 * Every name the template refers to as a binding: globals such as `Map` and
 * `Symbol`, the template symbols and local bindings.
 */
export const referencedNames = (
  sourceFile: ts.SourceFile
): ReadonlySet<string> => {
  const names = new Set<string>();
  const visit = (node: ts.Node, parent: ts.Node): void => {
    if (ts.isIdentifier(node) && !isMemberName(node, parent)) {
      names.add(node.text);
    }
    ts.forEachChild(node, (child) => visit(child, node));
  };
  ts.forEachChild(sourceFile, (child) => visit(child, sourceFile));
  return names;
};

/**
 * Reject renames whose new name is already bound in the template. Template
 * symbols are renamed together, so reusing one of their old names is fine.
 */
export const checkRenameConflicts = (
  renames: SymbolRenameMap,
  referenced: ReadonlySet<string>
): Result<SymbolRenameMap, Diagnostic> => {
  for (const [from, to] of renames) {
    if (to !== from && !renames.has(to) && referenced.has(to)) {
      return error(
        createDiagnostic(
          "MMP1004",
          "error",
          `invalid name \`${to}\`: the template already refers to \`${to}\``,
          undefined,
          `Pick a class name that does not turn \`${from}\` into a name the template uses`
        )
      );
    }
  }
  return ok(renames);
};

/**
 * Transformer that applies `renames` to every binding and reference in a
 * file. Member names are left alone, as are subtrees for which `isOpaque`
 * holds (spliced caller types).
 */
export const createRenameTransformer =
  (
    renames: SymbolRenameMap,
    isOpaque: (node: ts.Node) => boolean
  ): ts.TransformerFactory<ts.SourceFile> =>
  (context) =>
  (sourceFile) => {
    const { factory } = context;

    const rename = (identifier: ts.Identifier): ts.Identifier => {
      const renamed = renames.get(identifier.text);
      return renamed === undefined
        ? identifier
        : positionAt(factory.createIdentifier(renamed), identifier);
    };

    const visit = (node: ts.Node, parent: ts.Node): ts.Node => {
      if (isOpaque(node)) {
        return node;
      }
      if (ts.isIdentifier(node)) {
        return isMemberName(node, parent) ? node : rename(node);
      }
      // `{ entry }` becomes `{ entry: renamedEntry }`.
      if (
        ts.isShorthandPropertyAssignment(node) &&
        renames.has(node.name.text)
      ) {
        return positionAt(
          factory.createPropertyAssignment(
            positionAt(factory.createIdentifier(node.name.text), node.name),
            rename(node.name)
          ),
          node
        );
      }
      return ts.visitEachChild(node, (child) => visit(child, node), context);
    };

    return ts.visitEachChild(
      sourceFile,
      (child) => visit(child, sourceFile),
      context
    );
  };
