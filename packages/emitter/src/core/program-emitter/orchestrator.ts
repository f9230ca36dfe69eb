/**
 * Program emission orchestrator
 */

import {
  createDiagnosticsCollector,
  ok,
  type AstProgram,
  type Diagnostic,
  type Result,
} from "@retarget/frontend";
import { resolveProfile } from "../../profiles/registry.js";
import {
  createContext,
  recordImport,
  type EmitterOptions,
  type ProgramEmission,
} from "../../types.js";
import { checkStructuralBalance } from "../../validation/balance.js";
import { defaultOptions } from "../options.js";
import { separateStatements } from "./separation.js";
import { emitWrapped } from "./assembly.js";

/**
 * Emit a program for one target.
 *
 * Fails only when the target cannot be resolved. Node shapes the profile
 * cannot express become placeholders, reported in `diagnostics` alongside
 * the brace balance check of the output.
 */
export const emitProgram = (
  program: AstProgram,
  target: string,
  options: EmitterOptions = {}
): Result<ProgramEmission, Diagnostic> => {
  const resolved = resolveProfile(target);
  if (!resolved.ok) {
    return resolved;
  }

  const profile = resolved.value;
  const finalOptions: EmitterOptions = { ...defaultOptions, ...options };
  const { imports, body } = separateStatements(program, profile);
  const context = imports.reduce(
    recordImport,
    createContext(profile, finalOptions, program)
  );

  const [content, finalContext] = emitWrapped(body, context);
  const code = content === "" ? "" : `${content}\n`;
  const balance = checkStructuralBalance(
    code,
    profile,
    createDiagnosticsCollector()
  );

  return ok({
    code,
    target: profile.id,
    diagnostics: [...finalContext.diagnostics, ...balance.diagnostics],
    usedBuiltins: [...finalContext.usedBuiltins].sort(),
    imports: finalContext.imports,
  });
};
