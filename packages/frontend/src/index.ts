/**
 * Retarget Frontend - syntax tree model and tree loader
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  withFile,
  createDiagnosticsCollector,
  addDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./ast/index.js";
