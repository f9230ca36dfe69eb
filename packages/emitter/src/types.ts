/**
 * Emitter Types
 * Main dispatcher - re-exports from emitter-types/ subdirectory
 */

export type {
  EmitterOptions,
  EmitterContext,
  CodeFragment,
  ProgramEmission,
} from "./emitter-types/index.js";
export {
  createContext,
  indent,
  atIndent,
  withScoped,
  pushScope,
  isDeclared,
  declare,
  reportDiagnostic,
  markBuiltin,
  recordImport,
  getIndent,
  DEFAULT_INDENT,
} from "./emitter-types/index.js";
