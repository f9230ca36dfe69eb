/**
 * Placeholder sites in emitted code
 */

import {
  addDiagnostic,
  createDiagnostic,
  type DiagnosticsCollector,
} from "@retarget/frontend";
import { PLACEHOLDER_TOKEN } from "../constants.js";
import type { LanguageProfile } from "../profiles/types.js";
import { scanOutsideStrings, type CodePosition } from "./scanner.js";

/**
 * Positions of the placeholder token outside string literals
 */
export const placeholderPositions = (
  code: string,
  profile: LanguageProfile
): readonly CodePosition[] => {
  const positions: CodePosition[] = [];
  let skipUntil = 0;
  scanOutsideStrings(code, profile.literals.strings.escape, (_char, position) => {
    if (
      position.index >= skipUntil &&
      code.startsWith(PLACEHOLDER_TOKEN, position.index)
    ) {
      positions.push(position);
      skipUntil = position.index + PLACEHOLDER_TOKEN.length;
    }
  });
  return positions;
};

export const findPlaceholders = (
  code: string,
  profile: LanguageProfile,
  collector: DiagnosticsCollector
): DiagnosticsCollector =>
  placeholderPositions(code, profile).reduce(
    (acc, position) =>
      addDiagnostic(
        acc,
        createDiagnostic(
          "RTG4002",
          "warning",
          `Placeholder '${PLACEHOLDER_TOKEN}' in output for target '${profile.id}'`,
          { file: "", line: position.line, column: position.column },
          "The target has no rule for this construct"
        )
      ),
    collector
  );
