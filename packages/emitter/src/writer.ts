/**
 * Artifact writer
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@monomap/frontend";

/**
 * Write `text` to `path`, creating its directory. Returns the path written.
 */
export const writeArtifact = (
  path: string,
  text: string
): Result<string, Diagnostic> => {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, text, "utf-8");
    return ok(path);
  } catch (err) {
    return error(
      createDiagnostic(
        "MMP3002",
        "error",
        `write ${JSON.stringify(path)}: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  }
};
