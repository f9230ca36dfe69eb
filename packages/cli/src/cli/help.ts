/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
Retarget - profile-driven multi-target code emitter v${VERSION}

USAGE:
  retarget <command> [options]

COMMANDS:
  emit <tree.json...>       Emit each syntax tree for every target
  targets                   List supported target languages
  help                      Show help
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: retarget.json)

EMIT OPTIONS:
  -t, --target <ids>        Target language, repeatable or comma separated
  -o, --out <dir>           Output directory (default: retargeted)
  --indent <n>              Spaces per indentation level (default: 4)
  --entry-class <name>      Class name for targets that wrap code in a class
  --no-header               Omit the generated file header
  --strict                  Fail when output carries placeholders or
                            unbalanced blocks

EXIT CODES:
  0 success, 1 failure, 2 usage error, 3 configuration error

EXAMPLES:
  retarget targets
  retarget emit hello.tree.json -t js -t rust
  retarget emit trees/*.json -t java,go -o out --strict
`);
};
