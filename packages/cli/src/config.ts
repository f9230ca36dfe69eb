/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { error, ok, type Result } from "@retarget/frontend";
import { DEFAULT_INDENT, findCatalogEntry } from "@retarget/emitter";
import type { CliOptions, ResolvedConfig, RetargetConfig } from "./types.js";

export const CONFIG_FILE_NAME = "retarget.json";

export const DEFAULT_OUTPUT_DIRECTORY = "retargeted";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

export const isValidIndent = (value: number): boolean =>
  Number.isInteger(value) && value >= 1 && value <= 16;

const optionalField = <T>(
  record: Readonly<Record<string, unknown>>,
  key: string,
  guard: (value: unknown) => value is T,
  expected: string
): Result<T | undefined, string> => {
  const value = record[key];
  if (value === undefined) {
    return ok(undefined);
  }
  return guard(value)
    ? ok(value)
    : error(`${CONFIG_FILE_NAME}: '${key}' must be ${expected}`);
};

const isString = (value: unknown): value is string => typeof value === "string";
const isBoolean = (value: unknown): value is boolean =>
  typeof value === "boolean";
const isIndent = (value: unknown): value is number =>
  typeof value === "number" && isValidIndent(value);

/**
 * Check a parsed retarget.json value field by field
 */
export const validateConfig = (
  value: unknown
): Result<RetargetConfig, string> => {
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME}: expected a JSON object`);
  }

  const targets = optionalField(value, "targets", isStringArray, "an array of strings");
  if (!targets.ok) return targets;
  const unknownTarget = (targets.value ?? []).find(
    (target) => findCatalogEntry(target) === undefined
  );
  if (unknownTarget !== undefined) {
    return error(`${CONFIG_FILE_NAME}: unknown target '${unknownTarget}'`);
  }

  const outputDirectory = optionalField(value, "outputDirectory", isString, "a string");
  if (!outputDirectory.ok) return outputDirectory;
  const indent = optionalField(value, "indent", isIndent, "an integer from 1 to 16");
  if (!indent.ok) return indent;
  const entryClassName = optionalField(value, "entryClassName", isString, "a string");
  if (!entryClassName.ok) return entryClassName;
  const header = optionalField(value, "header", isBoolean, "a boolean");
  if (!header.ok) return header;
  const strict = optionalField(value, "strict", isBoolean, "a boolean");
  if (!strict.ok) return strict;

  return ok({
    targets: targets.value,
    outputDirectory: outputDirectory.value,
    indent: indent.value,
    entryClassName: entryClassName.value,
    header: header.value,
    strict: strict.value,
  });
};

/**
 * Load retarget.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<RetargetConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return validateConfig(JSON.parse(content));
  } catch (e) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
};

/**
 * Find retarget.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args. CLI flags win; the
 * configured output directory is relative to the project root.
 */
export const resolveConfig = (
  config: RetargetConfig,
  cliOptions: CliOptions,
  projectRoot: string
): ResolvedConfig => {
  const cliTargets = cliOptions.targets ?? [];

  return {
    projectRoot,
    targets: cliTargets.length > 0 ? cliTargets : (config.targets ?? []),
    outputDirectory:
      cliOptions.out ??
      join(projectRoot, config.outputDirectory ?? DEFAULT_OUTPUT_DIRECTORY),
    indent: cliOptions.indent ?? config.indent ?? DEFAULT_INDENT,
    entryClassName: cliOptions.entryClassName ?? config.entryClassName,
    header: cliOptions.noHeader ? false : (config.header ?? true),
    strict: cliOptions.strict ?? config.strict ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
