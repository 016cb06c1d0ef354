/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export {
  VERSION,
  showHelp,
  parseArgs,
  runCli,
  type CliHooks,
} from "./cli/index.js";
