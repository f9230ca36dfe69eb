/**
 * CLI argument parser
 */

import { isValidIndent } from "../config.js";
import type { CliOptions, ParsedArgs } from "../types.js";

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const files: string[] = [];
  const errors: string[] = [];
  let command = "";

  // The value must follow the flag and must not be another flag
  const valueAfter = (index: number, flag: string): string | undefined => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith("-")) {
      errors.push(`Option '${flag}' requires a value`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // Positional args after the command are tree files
    if (!arg.startsWith("-")) {
      files.push(arg);
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", files: [], options: {}, errors: [] };
      case "-v":
      case "--version":
        return { command: "version", files: [], options: {}, errors: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config": {
        const value = valueAfter(i, arg);
        if (value !== undefined) {
          options.config = value;
          i++;
        }
        break;
      }
      case "-t":
      case "--target": {
        const value = valueAfter(i, arg);
        if (value !== undefined) {
          i++;
          // -t js,py and -t js -t py are equivalent
          const targets = value
            .split(",")
            .map((target) => target.trim())
            .filter((target) => target !== "");
          options.targets = [...(options.targets ?? []), ...targets];
        }
        break;
      }
      case "-o":
      case "--out": {
        const value = valueAfter(i, arg);
        if (value !== undefined) {
          options.out = value;
          i++;
        }
        break;
      }
      case "--indent": {
        const value = valueAfter(i, arg);
        if (value !== undefined) {
          i++;
          const indent = Number(value);
          if (isValidIndent(indent)) {
            options.indent = indent;
          } else {
            errors.push(`Invalid indent '${value}': expected an integer from 1 to 16`);
          }
        }
        break;
      }
      case "--entry-class": {
        const value = valueAfter(i, arg);
        if (value !== undefined) {
          options.entryClassName = value;
          i++;
        }
        break;
      }
      case "--no-header":
        options.noHeader = true;
        break;
      case "--strict":
        options.strict = true;
        break;
      default:
        errors.push(`Unknown option '${arg}'`);
    }
  }

  if (options.quiet && options.verbose) {
    errors.push("Options '--quiet' and '--verbose' cannot be combined");
  }

  return { command, files, options, errors };
};
