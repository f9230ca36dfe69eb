/**
 * Post-emission validation - coordinates all checks
 */

import {
  createDiagnosticsCollector,
  type DiagnosticsCollector,
} from "@retarget/frontend";
import type { LanguageProfile } from "../profiles/types.js";
import { checkStructuralBalance } from "./balance.js";
import { findPlaceholders } from "./placeholders.js";
import { checkSyntax } from "./syntax.js";

export { checkStructuralBalance, countBraces, type BraceCount } from "./balance.js";
export { findPlaceholders, placeholderPositions } from "./placeholders.js";
export { checkSyntax } from "./syntax.js";
export { scanOutsideStrings, type CodePosition } from "./scanner.js";

/**
 * Validate emitted code. Every check reports warnings; none throws.
 */
export const validateEmission = (
  code: string,
  profile: LanguageProfile
): DiagnosticsCollector => {
  const checks = [findPlaceholders, checkStructuralBalance, checkSyntax];

  return checks.reduce(
    (acc, check) => check(code, profile, acc),
    createDiagnosticsCollector()
  );
};
