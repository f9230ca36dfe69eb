/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic } from "@retarget/frontend";
import { findConfig, loadConfig, resolveConfig } from "../config.js";
import { emitCommand, resolveTargets } from "../commands/emit.js";
import { targetsCommand } from "../commands/targets.js";
import type { CliOptions, RetargetConfig } from "../types.js";
import {
  EXIT_CONFIG,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  EXIT_USAGE,
  VERSION,
} from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const usageError = (message: string): number => {
  console.error(`Error: ${message}`);
  console.error("Run 'retarget --help' for usage information");
  return EXIT_USAGE;
};

type LoadedProjectConfig = {
  readonly config: RetargetConfig;
  readonly projectRoot: string;
};

/**
 * The config named by --config, else the nearest retarget.json, else none
 */
const loadProjectConfig = (
  options: CliOptions,
  cwd: string
): LoadedProjectConfig | string => {
  const configPath = options.config
    ? resolve(cwd, options.config)
    : findConfig(cwd);

  if (!configPath) {
    return { config: {}, projectRoot: cwd };
  }

  const configResult = loadConfig(configPath);
  return configResult.ok
    ? { config: configResult.value, projectRoot: dirname(configPath) }
    : configResult.error;
};

const runEmit = (
  files: readonly string[],
  options: CliOptions,
  cwd: string
): number => {
  const loaded = loadProjectConfig(options, cwd);
  if (typeof loaded === "string") {
    console.error(`Error: ${loaded}`);
    return EXIT_CONFIG;
  }

  const config = resolveConfig(
    loaded.config,
    options.out === undefined
      ? options
      : { ...options, out: resolve(cwd, options.out) },
    loaded.projectRoot
  );

  if (files.length === 0) {
    return usageError("At least one tree file is required");
  }
  if (config.targets.length === 0) {
    return usageError("At least one target is required (-t <target>)");
  }

  const targets = resolveTargets(config.targets);
  if (!targets.ok) {
    console.error(formatDiagnostic(targets.error));
    return EXIT_CONFIG;
  }

  const result = emitCommand(
    files.map((file) => resolve(cwd, file)),
    targets.value,
    config
  );
  if (!result.ok) {
    console.error(`Error: ${result.error}`);
    return EXIT_FAILURE;
  }

  if (config.strict && result.value.warnings.length > 0) {
    console.error(
      `Error: ${result.value.warnings.length} warning(s) reported in strict mode`
    );
    return EXIT_FAILURE;
  }

  return EXIT_SUCCESS;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`retarget v${VERSION}`);
    return EXIT_SUCCESS;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_SUCCESS;
  }

  const [firstError] = parsed.errors;
  if (firstError !== undefined) {
    return usageError(firstError);
  }

  switch (parsed.command) {
    case "emit":
      return runEmit(parsed.files, parsed.options, cwd);

    case "targets":
      targetsCommand();
      return EXIT_SUCCESS;

    default:
      return usageError(`Unknown command '${parsed.command}'`);
  }
};
