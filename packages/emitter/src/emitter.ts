/**
 * Main Emitter - Public API
 * Orchestrates target code generation from syntax trees
 */

import type { AstProgram, Diagnostic, Result } from "@retarget/frontend";
import type { EmitterOptions, ProgramEmission } from "./types.js";
import { emitProgram } from "./core/program-emitter.js";

/**
 * Batch emit several programs for several targets, program-major.
 *
 * Every emission builds its own context, so results never depend on the
 * order of the batch.
 */
export const emitPrograms = (
  programs: readonly AstProgram[],
  targets: readonly string[],
  options: EmitterOptions = {}
): readonly Result<ProgramEmission, Diagnostic>[] =>
  programs.flatMap((program) =>
    targets.map((target) => emitProgram(program, target, options))
  );

export { emitProgram } from "./core/program-emitter.js";
