/**
 * Syntax parser - turns source text into a TypeScript syntax tree
 */

import * as ts from "typescript";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import { ok, error, type Result } from "./types/result.js";

/**
 * Parse text as a TypeScript module with parent pointers set.
 */
export const createSourceFile = (
  fileName: string,
  text: string
): ts.SourceFile =>
  ts.createSourceFile(
    fileName,
    text,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS
  );

/**
 * Syntactic diagnostics of a parsed file.
 *
 * A one-file program with no lib and no module resolution is enough to
 * surface the parser's own diagnostics.
 */
export const getSyntaxErrors = (
  sourceFile: ts.SourceFile
): readonly ts.Diagnostic[] => {
  const options: ts.CompilerOptions = {
    noLib: true,
    noResolve: true,
    types: [],
  };
  const host = ts.createCompilerHost(options);
  host.getSourceFile = (name: string) =>
    name === sourceFile.fileName ? sourceFile : undefined;

  const program = ts.createProgram([sourceFile.fileName], options, host);
  return program.getSyntacticDiagnostics(sourceFile);
};

export const describeSyntaxError = (diagnostic: ts.Diagnostic): string =>
  ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");

/**
 * Parse a template source, rejecting text with syntax errors.
 */
export const parseSource = (
  fileName: string,
  text: string
): Result<ts.SourceFile, Diagnostic> => {
  const sourceFile = createSourceFile(fileName, text);
  const [first, ...rest] = getSyntaxErrors(sourceFile);

  if (first === undefined) {
    return ok(sourceFile);
  }

  const position = sourceFile.getLineAndCharacterOfPosition(first.start ?? 0);
  return error(
    createDiagnostic(
      "MMP2006",
      "error",
      `template does not parse: ${describeSyntaxError(first)}`,
      {
        file: fileName,
        line: position.line + 1,
        column: position.character + 1,
        length: first.length ?? 0,
      },
      rest.length > 0 ? `${rest.length} more syntax error(s)` : undefined
    )
  );
};
