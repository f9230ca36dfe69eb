/**
 * Block delimiter balance of brace-style output
 */

import {
  addDiagnostic,
  createDiagnostic,
  type DiagnosticsCollector,
} from "@retarget/frontend";
import type { LanguageProfile } from "../profiles/types.js";
import { scanOutsideStrings } from "./scanner.js";

export type BraceCount = {
  readonly open: number;
  readonly close: number;
};

export const countBraces = (code: string, escape: string): BraceCount => {
  let open = 0;
  let close = 0;
  scanOutsideStrings(code, escape, (char) => {
    if (char === "{") {
      open++;
    } else if (char === "}") {
      close++;
    }
  });
  return { open, close };
};

/**
 * Flag brace-style output whose `{` and `}` counts differ. Other block
 * styles have no delimiter to count.
 */
export const checkStructuralBalance = (
  code: string,
  profile: LanguageProfile,
  collector: DiagnosticsCollector
): DiagnosticsCollector => {
  if (profile.blockStyle !== "brace") {
    return collector;
  }

  const { open, close } = countBraces(code, profile.literals.strings.escape);
  return open === close
    ? collector
    : addDiagnostic(
        collector,
        createDiagnostic(
          "RTG4001",
          "warning",
          `Unbalanced block delimiters: ${open} '{' against ${close} '}'`
        )
      );
};
