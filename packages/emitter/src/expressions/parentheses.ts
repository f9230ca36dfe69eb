/**
 * Parenthesization helpers.
 *
 * Emitted operands are wrapped by the precedence of the source tree, raised
 * where a profile marks a token as binding tighter in the target. Bitwise
 * operators bind differently across targets (Go groups `&` with `*`), so
 * their operands are wrapped whenever they are themselves binary operations.
 */

import type { BinaryOperator, BooleanOperator } from "@retarget/frontend";
import type { CodeFragment } from "../types.js";

export const PRECEDENCE = {
  lowest: 0,
  or: 1,
  and: 2,
  not: 3,
  comparison: 4,
  bitOr: 5,
  bitXor: 6,
  bitAnd: 7,
  shift: 8,
  additive: 9,
  multiplicative: 10,
  unary: 11,
  power: 12,
  atom: 13,
} as const;

const BINARY_PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
  "|": PRECEDENCE.bitOr,
  "^": PRECEDENCE.bitXor,
  "&": PRECEDENCE.bitAnd,
  "<<": PRECEDENCE.shift,
  ">>": PRECEDENCE.shift,
  "+": PRECEDENCE.additive,
  "-": PRECEDENCE.additive,
  "*": PRECEDENCE.multiplicative,
  "/": PRECEDENCE.multiplicative,
  "//": PRECEDENCE.multiplicative,
  "%": PRECEDENCE.multiplicative,
  "**": PRECEDENCE.power,
};

export const binaryPrecedence = (op: BinaryOperator): number =>
  BINARY_PRECEDENCE[op];

export const booleanPrecedence = (op: BooleanOperator): number =>
  op === "and" ? PRECEDENCE.and : PRECEDENCE.or;

const isBitwise = (precedence: number): boolean =>
  precedence >= PRECEDENCE.bitOr && precedence <= PRECEDENCE.shift;

export const atom = (text: string): CodeFragment => ({
  text,
  precedence: PRECEDENCE.atom,
});

export const parenthesize = (fragment: CodeFragment): CodeFragment =>
  atom(`(${fragment.text})`);

/**
 * Wrap a fragment that binds looser than `minimum`
 */
export const wrapBelow = (
  fragment: CodeFragment,
  minimum: number
): CodeFragment =>
  fragment.precedence < minimum ? parenthesize(fragment) : fragment;

/**
 * Operand of an infix binary operator of the given precedence
 */
export const formatBinaryOperand = (
  operand: CodeFragment,
  precedence: number,
  side: "left" | "right",
  rightAssociative: boolean
): CodeFragment => {
  if (operand.precedence < precedence) {
    return parenthesize(operand);
  }
  if (operand.precedence === precedence) {
    const associates = rightAssociative ? side === "right" : side === "left";
    return associates ? operand : parenthesize(operand);
  }
  if (
    isBitwise(precedence) &&
    operand.precedence < PRECEDENCE.unary &&
    operand.precedence !== precedence
  ) {
    return parenthesize(operand);
  }
  return operand;
};

/**
 * Operand of a comparison. Arithmetic binds tighter than comparison in every
 * target; bitwise operators do not. Tokens binding tighter than arithmetic
 * (R's `%in%`) raise `level`.
 */
export const formatComparisonOperand = (
  operand: CodeFragment,
  level: number = PRECEDENCE.comparison
): CodeFragment =>
  wrapBelow(operand, Math.max(level, PRECEDENCE.additive));
