/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
metaderive - metadata derivation for TypeScript interfaces v${VERSION}

USAGE:
  metaderive <command> [options]

COMMANDS:
  generate                  Derive every configured target and write modules
  inspect [file]            Print the interface model of the sources or a file
  help                      Show help
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: metaderive.json)

GENERATE OPTIONS:
  -o, --out <dir>           Output directory (default: generated)

EXAMPLES:
  metaderive generate
  metaderive generate --out src/generated
  metaderive inspect src/api.ts
`);
};
