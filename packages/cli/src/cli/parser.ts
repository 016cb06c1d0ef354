/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

type ValueOption = "out" | "module" | "name" | "template";

const VALUE_OPTIONS: ReadonlyMap<string, ValueOption> = new Map<
  string,
  ValueOption
>([
  ["-o", "out"],
  ["--out", "out"],
  ["-m", "module"],
  ["--module", "module"],
  ["-n", "name"],
  ["--name", "name"],
  ["-t", "template"],
  ["--template", "template"],
]);

const usage = (message: string): ParsedArgs => ({ command: "usage", message });

/**
 * Parse CLI arguments. The last positional argument is the type literal.
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let literal: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (!arg.startsWith("-")) {
      literal = arg;
      continue;
    }

    const valueOption = VALUE_OPTIONS.get(arg);
    if (valueOption !== undefined) {
      const value = args[i + 1];
      if (value === undefined) {
        return usage(`option ${arg} requires a value`);
      }
      options[valueOption] = value;
      i++;
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help" };
      case "-v":
      case "--version":
        return { command: "version" };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      default:
        return usage(`unknown option ${arg}`);
    }
  }

  if (literal === undefined) {
    return usage("missing type literal, such as Map<string, number>");
  }

  return { command: "generate", literal, options };
};
