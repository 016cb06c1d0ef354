/**
 * Import normalization through the TypeScript language service.
 *
 * The generated text is loaded into an in-memory language service under a
 * virtual path; no other file is read and no library is loaded.
 */

import { posix } from "node:path";
import * as ts from "typescript";
import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@monomap/frontend";

/**
 * Rewrites the imports of generated text. Injectable so the emit pipeline
 * can be driven with a normalizer of its own.
 */
export type ImportNormalizer = (
  fileName: string,
  text: string
) => Result<string, Diagnostic>;

const VIRTUAL_ROOT = "/monomap";

const COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  noLib: true,
  noResolve: true,
  types: [],
};

/**
 * Apply non-overlapping edits, last first, so earlier spans stay valid
 */
export const applyTextChanges = (
  text: string,
  changes: readonly ts.TextChange[]
): string =>
  [...changes]
    .sort((a, b) => b.span.start - a.span.start)
    .reduce(
      (current, change) =>
        current.slice(0, change.span.start) +
        change.newText +
        current.slice(change.span.start + change.span.length),
      text
    );

const createHost = (
  path: string,
  text: string
): ts.LanguageServiceHost => ({
  getCompilationSettings: () => COMPILER_OPTIONS,
  getScriptFileNames: () => [path],
  getScriptVersion: () => "0",
  getScriptSnapshot: (name) =>
    name === path ? ts.ScriptSnapshot.fromString(text) : undefined,
  getCurrentDirectory: () => VIRTUAL_ROOT,
  getDefaultLibFileName: (options) => ts.getDefaultLibFilePath(options),
  fileExists: (name) => name === path,
  readFile: (name) => (name === path ? text : undefined),
});

/**
 * Remove unused imports and sort the rest
 */
export const normalizeImports: ImportNormalizer = (fileName, text) => {
  const path = posix.join(VIRTUAL_ROOT, posix.basename(fileName));
  const service = ts.createLanguageService(
    createHost(path, text),
    ts.createDocumentRegistry()
  );

  try {
    const changes = service
      .organizeImports(
        { type: "file", fileName: path },
        ts.getDefaultFormatCodeSettings("\n"),
        undefined
      )
      .filter((fileChanges) => fileChanges.fileName === path)
      .flatMap((fileChanges) => fileChanges.textChanges);
    return ok(applyTextChanges(text, changes));
  } catch (err) {
    return error(
      createDiagnostic(
        "MMP4001",
        "error",
        `normalize imports of ${JSON.stringify(fileName)}: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  } finally {
    service.dispose();
  }
};
