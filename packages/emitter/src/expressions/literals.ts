/**
 * Literal expression emitters
 */

import type { AstConstant, AstExpression } from "@retarget/frontend";
import type { LanguageProfile } from "../profiles/types.js";
import type { CodeFragment, EmitterContext } from "../types.js";
import { emitUnsupportedExpression } from "../core/unsupported.js";
import { atom, PRECEDENCE } from "./parentheses.js";

const CONTROL_ESCAPES: Readonly<Record<string, string>> = {
  "\n": "n",
  "\r": "r",
  "\t": "t",
};

/**
 * Quote a string in the target's string syntax. The escape character, the
 * quote and any interpolation sigil are escaped; line breaks and tabs
 * become escape sequences.
 */
export const quoteString = (
  value: string,
  strings: LanguageProfile["literals"]["strings"]
): string => {
  let body = "";
  for (const char of value) {
    const control = CONTROL_ESCAPES[char];
    if (control !== undefined) {
      body += strings.escape + control;
    } else if (
      char === strings.escape ||
      char === strings.quote ||
      strings.interpolation.includes(char)
    ) {
      body += strings.escape + char;
    } else {
      body += char;
    }
  }
  return strings.quote + body + strings.quote;
};

/**
 * Emit a constant
 */
export const emitConstant = (
  expr: AstConstant,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const { literals } = context.profile;
  const { value } = expr;

  if (value === null) {
    return [atom(literals.null), context];
  }

  if (typeof value === "string") {
    return [atom(quoteString(value, literals.strings)), context];
  }
  if (typeof value === "boolean") {
    return [atom(value ? literals.true : literals.false), context];
  }
  if (!Number.isFinite(value)) {
    return emitUnsupportedExpression(
      context,
      `the non-finite number ${String(value)}`,
      expr.location
    );
  }
  // Negative literals bind like a unary minus
  return [
    {
      text: String(value),
      precedence: value < 0 ? PRECEDENCE.unary : PRECEDENCE.atom,
    },
    context,
  ];
};

export const isStringConstant = (expr: AstExpression): boolean =>
  expr.kind === "constant" && typeof expr.value === "string";
