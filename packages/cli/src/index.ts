/**
 * monomap CLI - public API
 */

export {
  runCli,
  parseArgs,
  showHelp,
  VERSION,
  type CliHooks,
} from "./cli.js";
export { generateCommand } from "./commands/generate.js";
export * from "./types.js";
export * from "./config.js";
