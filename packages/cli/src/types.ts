/**
 * Type definitions for CLI
 */

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  out?: string;
  module?: string;
  name?: string;
  template?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Outcome of argument parsing
 */
export type ParsedArgs =
  | { readonly command: "help" }
  | { readonly command: "version" }
  | { readonly command: "usage"; readonly message: string }
  | {
      readonly command: "generate";
      readonly literal: string;
      readonly options: CliOptions;
    };

/**
 * Resolved configuration, defaults applied
 */
export type ResolvedConfig = {
  /** Mapping type literal, such as `Map<string, number>` */
  readonly literal: string;
  readonly name: string;
  readonly moduleName: string;
  readonly outPath: string;
  /** Template override; the bundled template when absent */
  readonly templatePath?: string;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
