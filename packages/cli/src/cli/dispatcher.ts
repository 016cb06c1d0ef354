/**
 * CLI command dispatcher
 */

import {
  createDiagnostic,
  flatMap,
  formatDiagnostic,
  type Diagnostic,
} from "@monomap/frontend";
import type { ImportNormalizer } from "@monomap/emitter";
import { resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import type { CliOptions } from "../types.js";
import { DIAGNOSTIC_PREFIX, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

export type CliHooks = {
  /** Working directory relative paths resolve against */
  readonly cwd?: string;
  readonly normalizer?: ImportNormalizer;
};

const report = (diagnostic: Diagnostic): void => {
  console.error(`${DIAGNOSTIC_PREFIX} ${formatDiagnostic(diagnostic)}`);
};

const generate = (
  literal: string,
  options: CliOptions,
  hooks: CliHooks
): number => {
  try {
    const result = flatMap(
      resolveConfig(literal, options, hooks.cwd),
      (config) => generateCommand(config, hooks.normalizer)
    );
    if (!result.ok) {
      report(result.error);
      return 1;
    }
    return 0;
  } catch (err) {
    report(
      createDiagnostic(
        "MMP9001",
        "error",
        `internal error: ${err instanceof Error ? err.message : String(err)}`
      )
    );
    return 1;
  }
};

/**
 * Main CLI entry point. Exit codes: 0 success, 1 generation failure,
 * 2 usage error.
 */
export const runCli = (
  args: readonly string[],
  hooks: CliHooks = {}
): number => {
  const parsed = parseArgs(args);

  switch (parsed.command) {
    case "version":
      console.log(`monomap v${VERSION}`);
      return 0;

    case "help":
      showHelp();
      return 0;

    case "usage":
      console.error(`${DIAGNOSTIC_PREFIX} ${parsed.message}`);
      console.error("Run 'monomap --help' for usage information");
      return 2;

    case "generate":
      return generate(parsed.literal, parsed.options, hooks);
  }
};
