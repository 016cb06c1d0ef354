/**
 * monomap frontend - template source, parsing and type-expression resolution
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  locationOf,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./parser.js";
export * from "./type-syntax.js";
export * from "./type-expression.js";
export * from "./template-source.js";
