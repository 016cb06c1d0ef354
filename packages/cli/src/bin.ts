#!/usr/bin/env tsx
/**
 * monomap executable
 */

import { runCli } from "./cli.js";

// Skip node and script name
process.exit(runCli(process.argv.slice(2)));
