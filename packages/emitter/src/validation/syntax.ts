/**
 * Syntax check of JavaScript and TypeScript output
 */

import * as ts from "typescript";
import {
  addDiagnostic,
  createDiagnostic,
  type DiagnosticsCollector,
  type SourceLocation,
} from "@retarget/frontend";
import type { LanguageProfile } from "../profiles/types.js";

const CHECKED_FILES: Readonly<Record<string, string>> = {
  javascript: "emitted.js",
  typescript: "emitted.ts",
};

const locationOf = (diagnostic: ts.Diagnostic): SourceLocation | undefined => {
  if (diagnostic.file === undefined || diagnostic.start === undefined) {
    return undefined;
  }
  const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(
    diagnostic.start
  );
  return { file: "", line: line + 1, column: character + 1 };
};

/**
 * Parse emitted JavaScript or TypeScript with the TypeScript compiler and
 * report its syntax errors. Other targets pass unchecked.
 */
export const checkSyntax = (
  code: string,
  profile: LanguageProfile,
  collector: DiagnosticsCollector
): DiagnosticsCollector => {
  const fileName = CHECKED_FILES[profile.id];
  if (fileName === undefined) {
    return collector;
  }

  const output = ts.transpileModule(code, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
    },
  });

  return (output.diagnostics ?? []).reduce(
    (acc, diagnostic) =>
      addDiagnostic(
        acc,
        createDiagnostic(
          "RTG4003",
          "warning",
          ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n"),
          locationOf(diagnostic)
        )
      ),
    collector
  );
};
