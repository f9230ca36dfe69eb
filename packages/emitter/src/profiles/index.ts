/**
 * Language profiles - Public API
 */

export type {
  BlockStyle,
  BindingLevel,
  InfixRule,
  OperatorRule,
  UnaryRule,
  BuiltinRule,
  DictRule,
  InheritanceRule,
  WrapperStrategy,
  LanguageProfile,
} from "./types.js";
export {
  TARGET_IDS,
  TARGET_CATALOG,
  findCatalogEntry,
  type TargetId,
  type CatalogEntry,
} from "./catalog.js";
export {
  PROFILES,
  resolveProfile,
  resolveCatalogEntry,
  listTargets,
} from "./registry.js";
