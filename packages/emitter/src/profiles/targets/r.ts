/**
 * R
 */

import type { LanguageProfile } from "../types.js";
import { builtin, call, infix, unary, C_BOOLEAN } from "../rules.js";

export const rProfile: LanguageProfile = {
  id: "r",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: "",
  keywords: {
    function: "function",
    classDecl: "setRefClass",
    selfReference: "self",
    noOp: "NULL",
    break: "break",
    continue: "next",
  },
  functions: {
    declaration: "{name} <- {keyword}({params})",
    method: "{class}_{name} <- function({params})",
    initializer: "{class} <- function({params})",
    parameter: "{name}",
    selfParameter: "self",
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: '{name} <- {keyword}("{name}")',
    inheritance: null,
    body: "flat",
    bodyPrologue: null,
    trailer: "",
    field: "{class}_{name} <- {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} <- {value}",
    declaration: null,
  },
  control: {
    if: "if ({test})",
    elseIf: "else if ({test})",
    else: "else",
    while: "while ({test})",
    forEach: "for ({var} in {iterable})",
    forRange: null,
  },
  statements: {
    return: "return({value})",
    returnVoid: "return(invisible(NULL))",
    augAssign: null,
  },
  literals: {
    true: "TRUE",
    false: "FALSE",
    null: "NULL",
    strings: { quote: '"', escape: "\\", interpolation: "" },
  },
  operators: {
    binary: {
      "+": "+",
      "-": "-",
      "*": "*",
      "/": "/",
      "//": infix("%/%", "power"),
      "%": infix("%%", "power"),
      "**": "^",
      "<<": call("bitwShiftL({left}, {right})"),
      ">>": call("bitwShiftR({left}, {right})"),
      "&": call("bitwAnd({left}, {right})"),
      "|": call("bitwOr({left}, {right})"),
      "^": call("bitwXor({left}, {right})"),
    },
    concat: call("paste0({left}, {right})"),
    comparison: {
      "==": "==",
      "!=": "!=",
      "<": "<",
      "<=": "<=",
      ">": ">",
      ">=": ">=",
      is: call("identical({left}, {right})"),
      "is not": call("!identical({left}, {right})"),
      in: infix("%in%", "power"),
      "not in": call("!({left} %in% {right})"),
    },
    unary: { not: "!", "-": "-", "+": "+", "~": call("bitwNot({operand})") },
    boolean: C_BOOLEAN,
  },
  expressions: {
    conditional: "if ({test}) {body} else {orelse}",
    attribute: "{value}${attr}",
    method: "{value}${attr}",
    selfAttribute: "self${attr}",
    selfMethod: "self${attr}",
    subscript: "{value}[[{index}]]",
    construct: "{class}({args})",
  },
  collections: {
    list: "list({items})",
    tuple: { template: "list({items})", singleton: null },
    dict: {
      kind: "literal",
      template: "list({entries})",
      entry: "{key} = {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin('cat({args}, "\\n")', { byArity: { 0: 'cat("\\n")' } }),
    len: unary("length({0})"),
    str: unary("as.character({0})"),
    range: builtin(null, {
      byArity: { 1: "seq_len({0}) - 1", 2: "seq({0}, {1} - 1)" },
    }),
  },
  wrapper: { kind: "none" },
};
