/**
 * Specialization engine - rewrites the map template for one key/value pair.
 *
 * Transform passes over the template:
 * 1. dispatch: every declaration goes through its handler, after which the
 *    exhaustiveness validator closes the run
 * 2. rename: template symbols take names derived from the class name
 * 3. layout: tuple types print on one line
 *
 * The template tree is never mutated; the result is a new source file.
 */

import * as ts from "typescript";
import {
  ok,
  flatMap,
  type Diagnostic,
  type Result,
} from "@monomap/frontend";
import { dispatchDeclarations } from "./dispatcher.js";
import { createSyncMapRegistry } from "./handlers.js";
import { createLayoutTransformer } from "./layout.js";
import type { DeclarationRegistry } from "./registry.js";
import {
  buildRenameMap,
  checkRenameConflicts,
  referencedNames,
  createRenameTransformer,
  validateClassName,
  type SymbolRenameMap,
} from "./renamer.js";
import { SpecializationSession } from "./session.js";
import type { SpecializationTarget } from "./types.js";
import { ExhaustivenessValidator } from "./validator.js";

export type SpecializedTemplate = {
  readonly sourceFile: ts.SourceFile;
  readonly target: SpecializationTarget;
  readonly renames: SymbolRenameMap;
  /** Number of declarations that went through a handler */
  readonly matched: number;
};

type DispatchOutcome = {
  result?: Result<number, Diagnostic>;
  session?: SpecializationSession;
};

const transformFile = (
  sourceFile: ts.SourceFile,
  transformers: readonly ts.TransformerFactory<ts.SourceFile>[]
): ts.SourceFile => {
  const result = ts.transform(sourceFile, [...transformers]);
  const [transformed] = result.transformed;
  result.dispose();
  if (transformed === undefined) {
    throw new Error("ICE: transform produced no source file");
  }
  return transformed;
};

/**
 * Specialize `template` to `target`.
 *
 * `registry` defaults to the handlers for the map template. A registry is
 * consumed by the run.
 */
export const specialize = (
  template: ts.SourceFile,
  target: SpecializationTarget,
  registry: DeclarationRegistry = createSyncMapRegistry()
): Result<SpecializedTemplate, Diagnostic> =>
  flatMap(
    flatMap(validateClassName(target.name), (name) =>
      checkRenameConflicts(buildRenameMap(name), referencedNames(template))
    ),
    (renames): Result<SpecializedTemplate, Diagnostic> => {
      const validator = new ExhaustivenessValidator(registry);
      const outcome: DispatchOutcome = {};

      const dispatch: ts.TransformerFactory<ts.SourceFile> =
        (context) => (sourceFile) => {
          const session = new SpecializationSession(context, target);
          outcome.session = session;

          const statements = dispatchDeclarations(
            { session, registry, validator },
            sourceFile
          );
          if (!statements.ok) {
            outcome.result = statements;
            return sourceFile;
          }
          outcome.result = validator.finalize();
          return context.factory.updateSourceFile(sourceFile, statements.value);
        };
      const dispatched = transformFile(template, [dispatch]);

      const { result, session } = outcome;
      if (result === undefined || session === undefined) {
        throw new Error("ICE: dispatch transformer did not run");
      }
      if (!result.ok) {
        return result;
      }

      const finished = transformFile(dispatched, [
        createRenameTransformer(renames, (node) => session.isSpliced(node)),
        createLayoutTransformer(),
      ]);

      return ok({
        sourceFile: finished,
        target,
        renames,
        matched: result.value,
      });
    }
  );
