/**
 * Kind guards for syntax nodes
 */

import type {
  AstExpression,
  AstStatement,
  SyntaxNode,
} from "./types/index.js";

type StatementKind = AstStatement["kind"];
type ExpressionKind = AstExpression["kind"];

const STATEMENT_KINDS: Readonly<Record<StatementKind, true>> = {
  functionDef: true,
  classDef: true,
  assign: true,
  augAssign: true,
  if: true,
  for: true,
  while: true,
  return: true,
  expressionStatement: true,
  pass: true,
  break: true,
  continue: true,
  import: true,
  unsupportedStatement: true,
};

const EXPRESSION_KINDS: Readonly<Record<ExpressionKind, true>> = {
  constant: true,
  name: true,
  call: true,
  binOp: true,
  compare: true,
  attribute: true,
  subscript: true,
  list: true,
  dict: true,
  tuple: true,
  unaryOp: true,
  boolOp: true,
  conditional: true,
  unsupportedExpression: true,
};

export const isStatementKind = (kind: string): kind is StatementKind =>
  Object.hasOwn(STATEMENT_KINDS, kind);

export const isExpressionKind = (kind: string): kind is ExpressionKind =>
  Object.hasOwn(EXPRESSION_KINDS, kind);

export const isAstStatement = (node: SyntaxNode): node is AstStatement =>
  isStatementKind(node.kind);

export const isAstExpression = (node: SyntaxNode): node is AstExpression =>
  isExpressionKind(node.kind);

/**
 * True for the definitions that a class-with-main wrapper lifts into members
 */
export const isDefinition = (statement: AstStatement): boolean =>
  statement.kind === "functionDef" || statement.kind === "classDef";

export const isRecord = (
  value: unknown
): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
