/**
 * Shared vocabulary of the source representation.
 *
 * Profiles and emitters key their rewrite tables on these names, so they are
 * declared once here instead of being spelled as ad hoc strings.
 */

/** Name of the receiver parameter and receiver expression in methods */
export const SELF_NAME = "self";

/** Method name that marks an initializer (constructor) */
export const INITIALIZER_NAME = "__init__";

export const BUILTIN_NAMES = ["print", "len", "str", "range"] as const;
export type BuiltinName = (typeof BUILTIN_NAMES)[number];

export const isBuiltinName = (name: string): name is BuiltinName =>
  BUILTIN_NAMES.some((builtin) => builtin === name);

export const BINARY_OPERATORS = [
  "+",
  "-",
  "*",
  "/",
  "//",
  "%",
  "**",
  "<<",
  ">>",
  "&",
  "|",
  "^",
] as const;
export type BinaryOperator = (typeof BINARY_OPERATORS)[number];

export const COMPARISON_OPERATORS = [
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
  "is",
  "is not",
  "in",
  "not in",
] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export const UNARY_OPERATORS = ["not", "-", "+", "~"] as const;
export type UnaryOperator = (typeof UNARY_OPERATORS)[number];

export const BOOLEAN_OPERATORS = ["and", "or"] as const;
export type BooleanOperator = (typeof BOOLEAN_OPERATORS)[number];

/**
 * Legacy constant spellings some parsers still report as plain names
 */
export const NAME_CONSTANTS: ReadonlyMap<string, boolean | null> = new Map<
  string,
  boolean | null
>([
  ["True", true],
  ["False", false],
  ["None", null],
]);

const includes = <T extends string>(
  values: readonly T[],
  value: string
): value is T => values.some((candidate) => candidate === value);

export const isBinaryOperator = (value: string): value is BinaryOperator =>
  includes(BINARY_OPERATORS, value);

export const isComparisonOperator = (
  value: string
): value is ComparisonOperator => includes(COMPARISON_OPERATORS, value);

export const isUnaryOperator = (value: string): value is UnaryOperator =>
  includes(UNARY_OPERATORS, value);

export const isBooleanOperator = (value: string): value is BooleanOperator =>
  includes(BOOLEAN_OPERATORS, value);
