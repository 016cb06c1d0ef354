/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
monomap - type-specialized read-mostly maps v${VERSION}

USAGE:
  monomap [options] <Map<K, V>>

  Accepts Map<K, V>, ReadonlyMap<K, V> and Record<K, V>.

OPTIONS:
  -o, --out <file>          Output file (default: <lowercased name>.ts)
  -m, --module <name>       Module name recorded in the header (default: main)
  -n, --name <name>         Generated class name (default: SyncMap)
  -t, --template <file>     Template override
  -V, --verbose             Report each pipeline step
  -q, --quiet               Suppress progress output
  -h, --help                Show help
  -v, --version             Show version

EXAMPLES:
  monomap "Map<string, number>"
  monomap -n IntMap -o src/intmap.ts "Map<string, number>"
  monomap -n UserCache -m users "ReadonlyMap<UserId, User>"
`);
};
