/**
 * Diagnostic types for monomap
 */

import * as ts from "typescript";

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Input errors (MMP1001-MMP1099)
  | "MMP1001" // Type literal is not a mapping type
  | "MMP1002" // Type expression does not parse
  | "MMP1003" // Type syntax cannot be spliced into the template
  | "MMP1004" // Struct name is not an identifier
  // Template-integrity errors (MMP2001-MMP2099)
  | "MMP2001" // Unrecognized declaration
  | "MMP2002" // Declaration was never matched
  | "MMP2003" // Value declaration list arity mismatch
  | "MMP2004" // Declaration matched more than once
  | "MMP2005" // Declaration shape differs from its handler
  | "MMP2006" // Template has syntax errors
  // I/O errors (MMP3001-MMP3099)
  | "MMP3001" // Template source unreadable
  | "MMP3002" // Output path unwritable
  // Post-processing errors (MMP4001-MMP4099)
  | "MMP4001" // Import normalization failed
  | "MMP4002" // Node without position reached the printer
  // Internal errors
  | "MMP9001"; // Internal generator error

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

/**
 * 1-based location of a node that still carries its parsed text range.
 * Synthesized nodes have no location.
 */
export const locationOf = (
  node: ts.Node,
  sourceFile: ts.SourceFile | undefined = undefined
): SourceLocation | undefined => {
  const file = sourceFile ?? node.getSourceFile();
  if (file === undefined || node.pos < 0) {
    return undefined;
  }
  const start = node.getStart(file);
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length: node.end - start,
  };
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
