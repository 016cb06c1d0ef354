/**
 * Template source provider - locates and reads the generic map template
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import { ok, error, type Result } from "./types/result.js";

export type TemplateSource = {
  readonly fileName: string;
  readonly text: string;
};

export const TEMPLATE_FILE_NAME = "sync-map.ts";

const moduleDir = dirname(fileURLToPath(import.meta.url));

/**
 * Places the bundled template may live, in lookup order
 */
export const templateCandidates = (): readonly string[] => [
  // packages/frontend/src -> packages/frontend/template
  join(moduleDir, "../template", TEMPLATE_FILE_NAME),
];

export const findTemplate = (): string | undefined =>
  templateCandidates().find((candidate) => existsSync(candidate));

/**
 * Read the template text. Without a path the bundled template is used.
 */
export const loadTemplate = (
  path?: string
): Result<TemplateSource, Diagnostic> => {
  const templatePath = path ?? findTemplate();
  if (templatePath === undefined) {
    return error(
      createDiagnostic(
        "MMP3001",
        "error",
        `template ${TEMPLATE_FILE_NAME} not found`,
        undefined,
        `Looked in: ${templateCandidates().join(", ")}`
      )
    );
  }

  try {
    return ok({
      fileName: templatePath,
      text: readFileSync(templatePath, "utf-8"),
    });
  } catch (err) {
    return error(
      createDiagnostic(
        "MMP3001",
        "error",
        `read ${JSON.stringify(templatePath)} file: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  }
};
