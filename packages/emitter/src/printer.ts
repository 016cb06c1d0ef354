/**
 * Printer for specialized source files
 */

import * as ts from "typescript";
import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@monomap/frontend";
import { hasPosition } from "@monomap/specializer";
import { generateFileHeader } from "./header.js";

export type PrintOptions = {
  /** Module name recorded in the file header */
  readonly moduleName: string;
};

/**
 * First node, in document order, that has neither a text position nor a
 * source-map position.
 */
export const findUnpositioned = (root: ts.Node): ts.Node | undefined => {
  let found: ts.Node | undefined;
  const visit = (node: ts.Node): void => {
    if (found !== undefined) {
      return;
    }
    if (!hasPosition(node)) {
      found = node;
      return;
    }
    ts.forEachChild(node, visit);
  };
  ts.forEachChild(root, visit);
  return found;
};

export const printSpecialization = (
  sourceFile: ts.SourceFile,
  options: PrintOptions
): Result<string, Diagnostic> => {
  const unpositioned = findUnpositioned(sourceFile);
  if (unpositioned !== undefined) {
    return error(
      createDiagnostic(
        "MMP4002",
        "error",
        `${ts.SyntaxKind[unpositioned.kind]} node reached the printer without a position`,
        undefined,
        "Nodes built during specialization must be positioned at the declaration they replace"
      )
    );
  }

  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  const body = printer.printFile(sourceFile);
  return ok(`${generateFileHeader(options.moduleName)}\n${body}`);
};
