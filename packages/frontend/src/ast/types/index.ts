/**
 * Syntax tree types - Public API
 */

export * from "./expressions.js";
export * from "./statements.js";
export * from "./program.js";
