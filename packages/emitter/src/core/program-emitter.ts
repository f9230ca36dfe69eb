/**
 * Program emission - Public API
 */

export { emitProgram } from "./program-emitter/orchestrator.js";
export { separateStatements } from "./program-emitter/separation.js";
export type { SeparatedStatements } from "./program-emitter/separation.js";
export { emitWrapped } from "./program-emitter/assembly.js";
