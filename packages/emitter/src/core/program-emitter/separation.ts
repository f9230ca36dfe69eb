/**
 * Top-level statement separation
 */

import type { AstImport, AstStatement, AstProgram } from "@retarget/frontend";
import type { LanguageProfile } from "../../profiles/types.js";

export type SeparatedStatements = {
  /** Import-like statements, dropped from the output */
  readonly imports: readonly AstImport[];
  /** Everything else, in source order */
  readonly body: readonly AstStatement[];
};

/**
 * Partition top-level statements into imports and the rest. A top-level
 * `pass` is dropped when the target has no no-op keyword.
 */
export const separateStatements = (
  program: AstProgram,
  profile: LanguageProfile
): SeparatedStatements => {
  const imports: AstImport[] = [];
  const body: AstStatement[] = [];

  for (const stmt of program.body) {
    if (stmt.kind === "import") {
      imports.push(stmt);
    } else if (stmt.kind !== "pass" || profile.keywords.noOp !== null) {
      body.push(stmt);
    }
  }

  return { imports, body };
};
