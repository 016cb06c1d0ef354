/**
 * Emit pipeline: print, normalize imports, write.
 *
 * Nothing is written unless printing and normalization both succeed.
 */

import type * as ts from "typescript";
import { flatMap, map, type Diagnostic, type Result } from "@monomap/frontend";
import { normalizeImports, type ImportNormalizer } from "./imports.js";
import { printSpecialization } from "./printer.js";
import { writeArtifact } from "./writer.js";

export type EmitOptions = {
  readonly moduleName: string;
  readonly outPath: string;
  readonly normalizer?: ImportNormalizer;
};

export type EmittedArtifact = {
  readonly path: string;
  readonly text: string;
};

export const emitSpecialization = (
  sourceFile: ts.SourceFile,
  options: EmitOptions
): Result<EmittedArtifact, Diagnostic> => {
  const normalizer = options.normalizer ?? normalizeImports;

  return flatMap(
    flatMap(
      printSpecialization(sourceFile, { moduleName: options.moduleName }),
      (printed) => normalizer(options.outPath, printed)
    ),
    (text) =>
      map(writeArtifact(options.outPath, text), (path) => ({ path, text }))
  );
};
