/**
 * Placeholder emission for node shapes the active profile cannot express
 */

import { createDiagnostic, type NodeLocation } from "@retarget/frontend";
import { PLACEHOLDER_TOKEN } from "../constants.js";
import { atom } from "../expressions/parentheses.js";
import {
  getIndent,
  reportDiagnostic,
  type CodeFragment,
  type EmitterContext,
} from "../types.js";

const reportUnsupported = (
  context: EmitterContext,
  description: string,
  location: NodeLocation | undefined
): EmitterContext =>
  reportDiagnostic(
    context,
    createDiagnostic(
      "RTG2002",
      "warning",
      `Target '${context.profile.id}' has no rule for ${description}`,
      location
        ? { file: "", line: location.line, column: location.column }
        : undefined,
      "A placeholder token was emitted"
    )
  );

export const emitUnsupportedExpression = (
  context: EmitterContext,
  description: string,
  location?: NodeLocation
): [CodeFragment, EmitterContext] => [
  atom(PLACEHOLDER_TOKEN),
  reportUnsupported(context, description, location),
];

/**
 * Whole statement replaced by the placeholder, at the current indentation
 */
export const emitUnsupportedStatement = (
  context: EmitterContext,
  description: string,
  location?: NodeLocation
): [string, EmitterContext] => [
  `${getIndent(context)}${PLACEHOLDER_TOKEN}${context.profile.terminator}`,
  reportUnsupported(context, description, location),
];
