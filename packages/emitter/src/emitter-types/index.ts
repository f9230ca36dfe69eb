/**
 * Emitter types - Public API
 */

export type {
  EmitterOptions,
  EmitterContext,
  CodeFragment,
  ProgramEmission,
} from "./core.js";
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
} from "./context.js";
export { getIndent, DEFAULT_INDENT } from "./formatting.js";
