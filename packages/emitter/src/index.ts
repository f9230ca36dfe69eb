/**
 * Retarget Emitter - profile-driven multi-target code generator
 */

export * from "./types.js";
export * from "./profiles/index.js";
export { emitExpression } from "./expression-emitter.js";
export { emitStatement } from "./statement-emitter.js";
export { emitProgram, emitPrograms } from "./emitter.js";
export { defaultOptions } from "./core/options.js";
export { renderTemplate, type TemplateSlots } from "./core/template.js";
export { PLACEHOLDER_TOKEN, generateFileHeader } from "./constants.js";
export {
  validateEmission,
  findPlaceholders,
  placeholderPositions,
  checkStructuralBalance,
  checkSyntax,
  countBraces,
} from "./validation/index.js";
