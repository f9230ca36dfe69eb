/**
 * Operator expression emitters (binary, comparison, unary, boolean,
 * conditional)
 */

import type {
  AstBinOp,
  AstBoolOp,
  AstCompare,
  AstConditional,
  AstUnaryOp,
} from "@retarget/frontend";
import { emitExpression } from "../expression-emitter.js";
import { renderTemplate } from "../core/template.js";
import { emitUnsupportedExpression } from "../core/unsupported.js";
import type { InfixRule, OperatorRule } from "../profiles/types.js";
import type { CodeFragment, EmitterContext } from "../types.js";
import { emitExpressionList } from "./calls.js";
import { isStringConstant } from "./literals.js";
import {
  binaryPrecedence,
  booleanPrecedence,
  formatBinaryOperand,
  formatComparisonOperand,
  PRECEDENCE,
} from "./parentheses.js";

const isWordToken = (token: string): boolean => /[A-Za-z]$/.test(token);

/**
 * The infix token of a rule, or undefined for a call-shaped rewrite
 */
export const infixToken = (rule: OperatorRule): string | undefined => {
  if (rule === null) {
    return undefined;
  }
  if (typeof rule === "string") {
    return rule;
  }
  return "token" in rule ? rule.token : undefined;
};

type InfixBinding = {
  readonly token: string;
  /** Level operands are wrapped against */
  readonly operand: number;
  /** Level the emitted operation reports to its parent */
  readonly result: number;
};

/**
 * Binding of an infix rule spelling a source operator of precedence
 * `source`. A token that binds differently in the target wraps its operands
 * by the tighter of the two levels and reports the looser one.
 */
const infixBinding = (
  rule: string | InfixRule,
  source: number
): InfixBinding => {
  if (typeof rule === "string") {
    return { token: rule, operand: source, result: source };
  }
  const target = PRECEDENCE[rule.binds];
  return {
    token: rule.token,
    operand: Math.max(source, target),
    result: Math.min(source, target),
  };
};

/**
 * The profile rule for a binary operator. `+` with a string literal on
 * either side is concatenation.
 */
export const binaryOperatorRule = (
  expr: Pick<AstBinOp, "left" | "op" | "right">,
  context: EmitterContext
): OperatorRule => {
  const { operators } = context.profile;
  const concatenates =
    expr.op === "+" &&
    (isStringConstant(expr.left) || isStringConstant(expr.right));
  return concatenates ? operators.concat : operators.binary[expr.op];
};

/**
 * Emit a binary operation
 */
export const emitBinaryOperation = (
  expr: AstBinOp,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const rule = binaryOperatorRule(expr, context);
  if (rule === null) {
    return emitUnsupportedExpression(
      context,
      `operator '${expr.op}'`,
      expr.location
    );
  }

  const [left, leftContext] = emitExpression(expr.left, context);
  const [right, rightContext] = emitExpression(expr.right, leftContext);

  if (typeof rule !== "string" && "template" in rule) {
    return [renderTemplate(rule.template, { left, right }), rightContext];
  }

  const binding = infixBinding(rule, binaryPrecedence(expr.op));
  const rightAssociative = expr.op === "**";
  const leftText = formatBinaryOperand(
    left,
    binding.operand,
    "left",
    rightAssociative
  ).text;
  const rightText = formatBinaryOperand(
    right,
    binding.operand,
    "right",
    rightAssociative
  ).text;

  return [
    {
      text: `${leftText} ${binding.token} ${rightText}`,
      precedence: binding.result,
    },
    rightContext,
  ];
};

/**
 * Emit a comparison. Chains stay space-joined; a rewrite that is not an
 * infix token only applies to a single comparison.
 */
export const emitComparison = (
  expr: AstCompare,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const { comparison } = context.profile.operators;
  const rules = expr.ops.map((op) => comparison[op]);

  const [first, firstContext] = emitExpression(expr.left, context);
  const [operands, operandsContext] = emitExpressionList(
    expr.comparators,
    firstContext
  );

  const [onlyRule] = rules;
  const [onlyOperand] = operands;
  if (
    rules.length === 1 &&
    onlyRule !== undefined &&
    onlyRule !== null &&
    typeof onlyRule !== "string" &&
    "template" in onlyRule &&
    onlyOperand !== undefined
  ) {
    return [
      renderTemplate(onlyRule.template, { left: first, right: onlyOperand }),
      operandsContext,
    ];
  }

  const bindings = rules.map((rule) =>
    rule === null || (typeof rule !== "string" && "template" in rule)
      ? undefined
      : infixBinding(rule, PRECEDENCE.comparison)
  );
  // An operand sits between two comparisons and takes the tighter need
  const operandLevel = (index: number): number =>
    Math.max(
      bindings[index - 1]?.operand ?? PRECEDENCE.comparison,
      bindings[index]?.operand ?? PRECEDENCE.comparison
    );

  const parts = [formatComparisonOperand(first, operandLevel(0)).text];
  for (const [index, binding] of bindings.entries()) {
    const operand = operands[index];
    if (binding === undefined || operand === undefined) {
      const op = expr.ops[index] ?? "";
      return emitUnsupportedExpression(
        operandsContext,
        rules.length > 1
          ? `chained comparison with '${op}'`
          : `comparison '${op}'`,
        expr.location
      );
    }
    parts.push(
      binding.token,
      formatComparisonOperand(operand, operandLevel(index + 1)).text
    );
  }

  return [
    { text: parts.join(" "), precedence: PRECEDENCE.comparison },
    operandsContext,
  ];
};

/**
 * Emit a unary operation. Word operators (`not`, `-not`) are separated from
 * the operand by a space; an empty token drops the operator.
 */
export const emitUnaryOperation = (
  expr: AstUnaryOp,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const rule = context.profile.operators.unary[expr.op];
  if (rule === null) {
    return emitUnsupportedExpression(
      context,
      `unary operator '${expr.op}'`,
      expr.location
    );
  }

  const [operand, operandContext] = emitExpression(expr.operand, context);

  if (typeof rule !== "string") {
    return [renderTemplate(rule.template, { operand }), operandContext];
  }
  if (rule === "") {
    return [operand, operandContext];
  }

  const operandText =
    operand.precedence < PRECEDENCE.atom ? `(${operand.text})` : operand.text;
  const separator = isWordToken(rule) ? " " : "";
  return [
    {
      text: `${rule}${separator}${operandText}`,
      precedence: expr.op === "not" ? PRECEDENCE.not : PRECEDENCE.unary,
    },
    operandContext,
  ];
};

/**
 * Emit a boolean operation over two or more values
 */
export const emitBooleanOperation = (
  expr: AstBoolOp,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const token = context.profile.operators.boolean[expr.op];
  const precedence = booleanPrecedence(expr.op);
  const [values, valuesContext] = emitExpressionList(expr.values, context);

  const text = values
    .map((value) =>
      value.precedence <= precedence ? `(${value.text})` : value.text
    )
    .join(` ${token} `);

  return [{ text, precedence }, valuesContext];
};

/**
 * Emit a conditional (ternary) expression
 */
export const emitConditional = (
  expr: AstConditional,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const template = context.profile.expressions.conditional;
  if (template === null) {
    return emitUnsupportedExpression(
      context,
      "conditional expressions",
      expr.location
    );
  }

  const [test, testContext] = emitExpression(expr.test, context);
  const [body, bodyContext] = emitExpression(expr.body, testContext);
  const [orelse, orelseContext] = emitExpression(expr.orelse, bodyContext);

  return [renderTemplate(template, { test, body, orelse }), orelseContext];
};
