/**
 * Statement nodes of the syntax tree
 */

import type { BinaryOperator } from "../vocabulary.js";
import type { AstExpression, NodeLocation } from "./expressions.js";

export type AstStatement =
  | AstFunctionDef
  | AstClassDef
  | AstAssign
  | AstAugAssign
  | AstIf
  | AstFor
  | AstWhile
  | AstReturn
  | AstExpressionStatement
  | AstPass
  | AstBreak
  | AstContinue
  | AstImport
  | AstUnsupportedStatement;

export type AstFunctionDef = {
  readonly kind: "functionDef";
  readonly name: string;
  readonly params: readonly string[];
  readonly body: readonly AstStatement[];
  readonly location?: NodeLocation;
};

export type AstClassDef = {
  readonly kind: "classDef";
  readonly name: string;
  readonly bases: readonly AstExpression[];
  readonly body: readonly AstStatement[];
  readonly location?: NodeLocation;
};

export type AstAssign = {
  readonly kind: "assign";
  readonly target: AstExpression;
  readonly value: AstExpression;
  readonly location?: NodeLocation;
};

export type AstAugAssign = {
  readonly kind: "augAssign";
  readonly target: AstExpression;
  readonly op: BinaryOperator;
  readonly value: AstExpression;
  readonly location?: NodeLocation;
};

/**
 * `elif` chains are represented as an `orelse` holding exactly one `if`.
 */
export type AstIf = {
  readonly kind: "if";
  readonly test: AstExpression;
  readonly body: readonly AstStatement[];
  readonly orelse: readonly AstStatement[];
  readonly location?: NodeLocation;
};

export type AstFor = {
  readonly kind: "for";
  readonly target: AstExpression;
  readonly iterable: AstExpression;
  readonly body: readonly AstStatement[];
  readonly location?: NodeLocation;
};

export type AstWhile = {
  readonly kind: "while";
  readonly test: AstExpression;
  readonly body: readonly AstStatement[];
  readonly location?: NodeLocation;
};

export type AstReturn = {
  readonly kind: "return";
  readonly value?: AstExpression;
  readonly location?: NodeLocation;
};

export type AstExpressionStatement = {
  readonly kind: "expressionStatement";
  readonly expression: AstExpression;
  readonly location?: NodeLocation;
};

export type AstPass = {
  readonly kind: "pass";
  readonly location?: NodeLocation;
};

export type AstBreak = {
  readonly kind: "break";
  readonly location?: NodeLocation;
};

export type AstContinue = {
  readonly kind: "continue";
  readonly location?: NodeLocation;
};

/**
 * Import-like statement. `names` is empty for a whole-module import.
 */
export type AstImport = {
  readonly kind: "import";
  readonly module: string;
  readonly names: readonly string[];
  readonly location?: NodeLocation;
};

/**
 * A statement the parser produced but the syntax model does not cover
 * (try, with, decorators, ...). Emitters substitute a placeholder.
 */
export type AstUnsupportedStatement = {
  readonly kind: "unsupportedStatement";
  readonly sourceKind: string;
  readonly location?: NodeLocation;
};
