/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson = require("@monomap/cli/package.json") as {
  version: string;
};

export const VERSION = packageJson.version;

/** Prefix of every diagnostic line */
export const DIAGNOSTIC_PREFIX = "monomap:";
