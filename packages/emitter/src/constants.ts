/**
 * Shared constants for the retarget emitter
 */

import type { CatalogEntry } from "./profiles/catalog.js";

/**
 * Emitted in place of any node the active profile cannot represent.
 * Post-emission validation scans for it.
 */
export const PLACEHOLDER_TOKEN = "__UNSUPPORTED__";

/**
 * Generate standard file header for emitted files, written in the target's
 * line comment style
 *
 * @param filePath - Tree file the output was emitted from
 * @param options - `timestamp` adds a "Generated at" line
 * @returns Multi-line header string with trailing newline
 */
export const generateFileHeader = (
  entry: CatalogEntry,
  filePath: string,
  options: {
    readonly timestamp?: string;
  } = {}
): string => {
  const lines: string[] = [];

  lines.push(`${entry.comment} Generated from: ${filePath}`);
  lines.push(`${entry.comment} Target: ${entry.name}`);

  if (options.timestamp !== undefined) {
    lines.push(`${entry.comment} Generated at: ${options.timestamp}`);
  }

  lines.push(`${entry.comment} WARNING: Do not modify this file manually`);
  lines.push("");

  return lines.join("\n");
};
