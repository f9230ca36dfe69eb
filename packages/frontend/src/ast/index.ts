/**
 * Syntax tree model - Public API
 */

export * from "./types/index.js";
export * from "./vocabulary.js";
export {
  isStatementKind,
  isExpressionKind,
  isAstStatement,
  isAstExpression,
  isDefinition,
} from "./guards.js";
export {
  loadTree,
  convertDocument,
  type LoadedTree,
  type TreeLoadFailure,
} from "./loader.js";
