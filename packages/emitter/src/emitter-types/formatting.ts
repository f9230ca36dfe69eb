/**
 * Formatting helper functions
 */

import type { EmitterContext } from "./core.js";

export const DEFAULT_INDENT = 4;

/**
 * Get indentation string for current level
 */
export const getIndent = (context: EmitterContext): string => {
  const spaces = context.options.indent ?? DEFAULT_INDENT;
  return " ".repeat(spaces * context.indentLevel);
};
