/**
 * Configuration resolution
 */

import { resolve } from "node:path";
import { map, type Diagnostic, type Result } from "@monomap/frontend";
import { validateClassName } from "@monomap/specializer";
import type { CliOptions, ResolvedConfig } from "./types.js";

export const DEFAULT_NAME = "SyncMap";
export const DEFAULT_MODULE = "main";

/**
 * Default output file for a class name
 */
export const defaultOutFile = (name: string): string =>
  `${name.toLowerCase()}.ts`;

/**
 * Apply defaults to CLI options. Paths resolve against `cwd`.
 */
export const resolveConfig = (
  literal: string,
  cliOptions: CliOptions,
  cwd: string = process.cwd()
): Result<ResolvedConfig, Diagnostic> =>
  map(validateClassName(cliOptions.name ?? DEFAULT_NAME), (name) => ({
    literal,
    name,
    moduleName: cliOptions.module ?? DEFAULT_MODULE,
    outPath: resolve(cwd, cliOptions.out ?? defaultOutFile(name)),
    templatePath:
      cliOptions.template === undefined
        ? undefined
        : resolve(cwd, cliOptions.template),
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  }));
