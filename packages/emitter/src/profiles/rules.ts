/**
 * Builders for the rule shapes shared by many profiles
 */

import type {
  BindingLevel,
  BuiltinRule,
  InfixRule,
  OperatorRule,
} from "./types.js";
import type { BinaryOperator, ComparisonOperator } from "@retarget/frontend";

export const builtin = (
  pattern: string | null,
  options: Partial<Omit<BuiltinRule, "pattern">> = {}
): BuiltinRule => ({
  pattern,
  byArity: options.byArity ?? {},
  separator: options.separator ?? ", ",
  hole: options.hole ?? "",
});

/**
 * Builtin with a single-argument form only
 */
export const unary = (template: string): BuiltinRule =>
  builtin(null, { byArity: { 1: template } });

export const call = (template: string): { readonly template: string } => ({
  template,
});

export const infix = (token: string, binds: BindingLevel): InfixRule => ({
  token,
  binds,
});

/**
 * Operator table of the C family; profiles override what they spell
 * differently.
 */
export const C_BINARY: Readonly<Record<BinaryOperator, OperatorRule>> = {
  "+": "+",
  "-": "-",
  "*": "*",
  "/": "/",
  "//": "/",
  "%": "%",
  "**": call("pow({left}, {right})"),
  "<<": "<<",
  ">>": ">>",
  "&": "&",
  "|": "|",
  "^": "^",
};

export const C_COMPARISON: Readonly<Record<ComparisonOperator, OperatorRule>> =
  {
    "==": "==",
    "!=": "!=",
    "<": "<",
    "<=": "<=",
    ">": ">",
    ">=": ">=",
    is: "==",
    "is not": "!=",
    in: null,
    "not in": null,
  };

export const C_UNARY = {
  not: "!",
  "-": "-",
  "+": "+",
  "~": "~",
} as const;

export const C_BOOLEAN = {
  and: "&&",
  or: "||",
} as const;
