/**
 * Julia
 */

import type { LanguageProfile } from "../types.js";
import { builtin, infix, unary } from "../rules.js";

export const juliaProfile: LanguageProfile = {
  id: "julia",
  blockStyle: "endKeyword",
  blockOpen: "",
  blockClose: "end",
  terminator: "",
  keywords: {
    function: "function",
    classDecl: "mutable struct",
    selfReference: "self",
    noOp: "nothing",
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "{keyword} {name}({params})",
    initializer: "function {class}({params})",
    parameter: "{name}",
    selfParameter: "self",
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name} end",
    inheritance: null,
    body: "flat",
    bodyPrologue: null,
    trailer: "",
    field: "const {class}_{name} = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: null,
  },
  control: {
    if: "if {test}",
    elseIf: "elseif {test}",
    else: "else",
    while: "while {test}",
    forEach: "for {var} in {iterable}",
    forRange: null,
  },
  statements: {
    return: "return {value}",
    returnVoid: "return",
    augAssign: "{target} {op}= {value}",
  },
  literals: {
    true: "true",
    false: "false",
    null: "nothing",
    strings: { quote: '"', escape: "\\", interpolation: "$" },
  },
  operators: {
    binary: {
      "+": "+",
      "-": "-",
      "*": "*",
      "/": "/",
      "//": "÷",
      "%": "%",
      "**": "^",
      "<<": "<<",
      ">>": ">>",
      "&": "&",
      "|": "|",
      "^": "⊻",
    },
    concat: infix("*", "multiplicative"),
    comparison: {
      "==": "==",
      "!=": "!=",
      "<": "<",
      "<=": "<=",
      ">": ">",
      ">=": ">=",
      is: "===",
      "is not": "!==",
      in: "in",
      "not in": "∉",
    },
    unary: { not: "!", "-": "-", "+": "+", "~": "~" },
    boolean: { and: "&&", or: "||" },
  },
  expressions: {
    conditional: "{test} ? {body} : {orelse}",
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "self.{attr}",
    selfMethod: "self.{attr}",
    subscript: "{value}[{index}]",
    construct: "{class}({args})",
  },
  collections: {
    list: "[{items}]",
    tuple: { template: "({items})", singleton: "({items},)" },
    dict: {
      kind: "literal",
      template: "Dict({entries})",
      entry: "{key} => {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("println({args})", { separator: ', " ", ' }),
    len: unary("length({0})"),
    str: unary("string({0})"),
    range: builtin(null, { byArity: { 1: "0:{0}-1", 2: "{0}:{1}-1" } }),
  },
  wrapper: { kind: "none" },
};
