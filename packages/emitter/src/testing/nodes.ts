/**
 * Syntax tree builders for emitter tests
 */

import type {
  AstExpression,
  AstProgram,
  AstStatement,
  BinaryOperator,
  BooleanOperator,
  ComparisonOperator,
  ConstantValue,
  UnaryOperator,
} from "@retarget/frontend";
import { PROFILES, type TargetId } from "../profiles/index.js";
import { emitExpression } from "../expression-emitter.js";
import { emitStatement } from "../statement-emitter.js";
import { emitProgram } from "../core/program-emitter.js";
import { defaultOptions } from "../core/options.js";
import {
  createContext,
  type EmitterContext,
  type EmitterOptions,
  type ProgramEmission,
} from "../types.js";

type ExpressionLike = AstExpression | string;

const expression = (value: ExpressionLike): AstExpression =>
  typeof value === "string" ? { kind: "name", id: value } : value;

export const name = (id: string): AstExpression => ({ kind: "name", id });

export const constant = (value: ConstantValue): AstExpression => ({
  kind: "constant",
  value,
});

export const call = (
  func: ExpressionLike,
  ...args: readonly ExpressionLike[]
): AstExpression => ({
  kind: "call",
  func: expression(func),
  args: args.map(expression),
});

export const binOp = (
  left: ExpressionLike,
  op: BinaryOperator,
  right: ExpressionLike
): AstExpression => ({
  kind: "binOp",
  left: expression(left),
  op,
  right: expression(right),
});

export const compare = (
  left: ExpressionLike,
  ...pairs: readonly (readonly [ComparisonOperator, ExpressionLike])[]
): AstExpression => ({
  kind: "compare",
  left: expression(left),
  ops: pairs.map(([op]) => op),
  comparators: pairs.map(([, value]) => expression(value)),
});

export const attribute = (
  value: ExpressionLike,
  attr: string
): AstExpression => ({ kind: "attribute", value: expression(value), attr });

export const subscript = (
  value: ExpressionLike,
  index: ExpressionLike
): AstExpression => ({
  kind: "subscript",
  value: expression(value),
  index: expression(index),
});

export const list = (...items: readonly ExpressionLike[]): AstExpression => ({
  kind: "list",
  items: items.map(expression),
});

export const tuple = (...items: readonly ExpressionLike[]): AstExpression => ({
  kind: "tuple",
  items: items.map(expression),
});

export const dict = (
  ...entries: readonly (readonly [ExpressionLike, ExpressionLike])[]
): AstExpression => ({
  kind: "dict",
  entries: entries.map(([key, value]) => ({
    key: expression(key),
    value: expression(value),
  })),
});

export const unaryOp = (
  op: UnaryOperator,
  operand: ExpressionLike
): AstExpression => ({ kind: "unaryOp", op, operand: expression(operand) });

export const boolOp = (
  op: BooleanOperator,
  ...values: readonly ExpressionLike[]
): AstExpression => ({ kind: "boolOp", op, values: values.map(expression) });

export const conditional = (
  test: ExpressionLike,
  body: ExpressionLike,
  orelse: ExpressionLike
): AstExpression => ({
  kind: "conditional",
  test: expression(test),
  body: expression(body),
  orelse: expression(orelse),
});

export const unsupportedExpression = (sourceKind: string): AstExpression => ({
  kind: "unsupportedExpression",
  sourceKind,
});

export const assign = (
  target: ExpressionLike,
  value: ExpressionLike
): AstStatement => ({
  kind: "assign",
  target: expression(target),
  value: expression(value),
});

export const augAssign = (
  target: ExpressionLike,
  op: BinaryOperator,
  value: ExpressionLike
): AstStatement => ({
  kind: "augAssign",
  target: expression(target),
  op,
  value: expression(value),
});

export const functionDef = (
  name: string,
  params: readonly string[],
  ...body: readonly AstStatement[]
): AstStatement => ({ kind: "functionDef", name, params, body });

export const classDef = (
  name: string,
  bases: readonly string[],
  ...body: readonly AstStatement[]
): AstStatement => ({
  kind: "classDef",
  name,
  bases: bases.map(expression),
  body,
});

export const ifStatement = (
  test: ExpressionLike,
  body: readonly AstStatement[],
  orelse: readonly AstStatement[] = []
): AstStatement => ({ kind: "if", test: expression(test), body, orelse });

export const forStatement = (
  target: ExpressionLike,
  iterable: ExpressionLike,
  ...body: readonly AstStatement[]
): AstStatement => ({
  kind: "for",
  target: expression(target),
  iterable: expression(iterable),
  body,
});

export const whileStatement = (
  test: ExpressionLike,
  ...body: readonly AstStatement[]
): AstStatement => ({ kind: "while", test: expression(test), body });

export const returnStatement = (value?: ExpressionLike): AstStatement =>
  value === undefined
    ? { kind: "return" }
    : { kind: "return", value: expression(value) };

export const expressionStatement = (value: ExpressionLike): AstStatement => ({
  kind: "expressionStatement",
  expression: expression(value),
});

export const print = (...args: readonly ExpressionLike[]): AstStatement =>
  expressionStatement(call("print", ...args));

export const pass: AstStatement = { kind: "pass" };
export const breakStatement: AstStatement = { kind: "break" };
export const continueStatement: AstStatement = { kind: "continue" };

export const importStatement = (
  module: string,
  ...names: readonly string[]
): AstStatement => ({ kind: "import", module, names });

export const unsupportedStatement = (sourceKind: string): AstStatement => ({
  kind: "unsupportedStatement",
  sourceKind,
});

export const program = (...body: readonly AstStatement[]): AstProgram => ({
  kind: "program",
  body,
});

/**
 * Fresh top-level context for one target, aware of the definitions in
 * `body`
 */
export const contextFor = (
  target: TargetId,
  body: readonly AstStatement[] = []
): EmitterContext =>
  createContext(PROFILES[target], defaultOptions, program(...body));

export const expressionText = (
  target: TargetId,
  expr: AstExpression
): string => emitExpression(expr, contextFor(target))[0].text;

export const statementText = (
  target: TargetId,
  stmt: AstStatement,
  context: EmitterContext = contextFor(target, [stmt])
): string => emitStatement(stmt, context)[0];

/**
 * Emit a whole program; an unknown target fails the test
 */
export const emit = (
  target: string,
  body: readonly AstStatement[],
  options?: EmitterOptions
): ProgramEmission => {
  const result = emitProgram(program(...body), target, options);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
};

export const emitCode = (
  target: string,
  ...body: readonly AstStatement[]
): string => emit(target, body).code;
