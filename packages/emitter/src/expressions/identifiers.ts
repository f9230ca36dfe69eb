/**
 * Identifier expression emitters
 */

import { SELF_NAME, type AstName } from "@retarget/frontend";
import type { LanguageProfile } from "../profiles/types.js";
import type { CodeFragment, EmitterContext } from "../types.js";
import { atom } from "./parentheses.js";

/**
 * Variable reference with the target's sigil (`$x` in PHP and Perl)
 */
export const formatVariable = (profile: LanguageProfile, id: string): string =>
  profile.variables.sigil + id;

/**
 * Emit a name in value position. The receiver name becomes the target's
 * self-reference.
 */
export const emitName = (
  expr: AstName,
  context: EmitterContext
): [CodeFragment, EmitterContext] =>
  expr.id === SELF_NAME
    ? [atom(context.profile.keywords.selfReference), context]
    : [atom(formatVariable(context.profile, expr.id)), context];
