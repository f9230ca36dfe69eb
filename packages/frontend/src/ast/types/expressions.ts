/**
 * Expression nodes of the syntax tree
 */

import type {
  BinaryOperator,
  BooleanOperator,
  ComparisonOperator,
  UnaryOperator,
} from "../vocabulary.js";

/**
 * Position of a node in the original source, when the parser reports one
 */
export type NodeLocation = {
  readonly line: number;
  readonly column: number;
};

export type AstExpression =
  | AstConstant
  | AstName
  | AstCall
  | AstBinOp
  | AstCompare
  | AstAttribute
  | AstSubscript
  | AstListLiteral
  | AstDictLiteral
  | AstTupleLiteral
  | AstUnaryOp
  | AstBoolOp
  | AstConditional
  | AstUnsupportedExpression;

export type ConstantValue = string | number | boolean | null;

export type AstConstant = {
  readonly kind: "constant";
  readonly value: ConstantValue;
  readonly location?: NodeLocation;
};

export type AstName = {
  readonly kind: "name";
  readonly id: string;
  readonly location?: NodeLocation;
};

export type AstCall = {
  readonly kind: "call";
  readonly func: AstExpression;
  readonly args: readonly AstExpression[];
  readonly location?: NodeLocation;
};

export type AstBinOp = {
  readonly kind: "binOp";
  readonly left: AstExpression;
  readonly op: BinaryOperator;
  readonly right: AstExpression;
  readonly location?: NodeLocation;
};

/**
 * Chained comparison: `left ops[0] comparators[0] ops[1] comparators[1] ...`
 * `ops` and `comparators` always have the same length.
 */
export type AstCompare = {
  readonly kind: "compare";
  readonly left: AstExpression;
  readonly ops: readonly ComparisonOperator[];
  readonly comparators: readonly AstExpression[];
  readonly location?: NodeLocation;
};

export type AstAttribute = {
  readonly kind: "attribute";
  readonly value: AstExpression;
  readonly attr: string;
  readonly location?: NodeLocation;
};

export type AstSubscript = {
  readonly kind: "subscript";
  readonly value: AstExpression;
  readonly index: AstExpression;
  readonly location?: NodeLocation;
};

export type AstListLiteral = {
  readonly kind: "list";
  readonly items: readonly AstExpression[];
  readonly location?: NodeLocation;
};

export type AstDictEntry = {
  readonly key: AstExpression;
  readonly value: AstExpression;
};

export type AstDictLiteral = {
  readonly kind: "dict";
  readonly entries: readonly AstDictEntry[];
  readonly location?: NodeLocation;
};

export type AstTupleLiteral = {
  readonly kind: "tuple";
  readonly items: readonly AstExpression[];
  readonly location?: NodeLocation;
};

export type AstUnaryOp = {
  readonly kind: "unaryOp";
  readonly op: UnaryOperator;
  readonly operand: AstExpression;
  readonly location?: NodeLocation;
};

export type AstBoolOp = {
  readonly kind: "boolOp";
  readonly op: BooleanOperator;
  readonly values: readonly AstExpression[];
  readonly location?: NodeLocation;
};

/** Inline conditional: `body if test else orelse` */
export type AstConditional = {
  readonly kind: "conditional";
  readonly test: AstExpression;
  readonly body: AstExpression;
  readonly orelse: AstExpression;
  readonly location?: NodeLocation;
};

/**
 * An expression the parser produced but the syntax model does not cover
 * (lambdas, comprehensions, ...). Emitters substitute a placeholder.
 */
export type AstUnsupportedExpression = {
  readonly kind: "unsupportedExpression";
  readonly sourceKind: string;
  readonly location?: NodeLocation;
};
