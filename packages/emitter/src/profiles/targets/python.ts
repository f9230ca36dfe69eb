/**
 * Python - the identity profile. Emitting a tree back to its origin
 * language exercises every rule without rewriting anything.
 */

import type { LanguageProfile } from "../types.js";
import { builtin } from "../rules.js";

export const pythonProfile: LanguageProfile = {
  id: "python",
  blockStyle: "indent",
  blockOpen: ":",
  blockClose: null,
  terminator: "",
  keywords: {
    function: "def",
    classDecl: "class",
    selfReference: "self",
    noOp: "pass",
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "{keyword} {name}({params})",
    initializer: "def __init__({params})",
    parameter: "{name}",
    selfParameter: "self",
    initializerSelfParameter: "self",
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name}",
    inheritance: { position: "header", template: "({bases})", bases: "all" },
    body: "block",
    bodyPrologue: null,
    trailer: "",
    field: "{name} = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: null,
  },
  control: {
    if: "if {test}",
    elseIf: "elif {test}",
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
    true: "True",
    false: "False",
    null: "None",
    strings: { quote: '"', escape: "\\", interpolation: "" },
  },
  operators: {
    binary: {
      "+": "+",
      "-": "-",
      "*": "*",
      "/": "/",
      "//": "//",
      "%": "%",
      "**": "**",
      "<<": "<<",
      ">>": ">>",
      "&": "&",
      "|": "|",
      "^": "^",
    },
    concat: "+",
    comparison: {
      "==": "==",
      "!=": "!=",
      "<": "<",
      "<=": "<=",
      ">": ">",
      ">=": ">=",
      is: "is",
      "is not": "is not",
      in: "in",
      "not in": "not in",
    },
    unary: { not: "not", "-": "-", "+": "+", "~": "~" },
    boolean: { and: "and", or: "or" },
  },
  expressions: {
    conditional: "{body} if {test} else {orelse}",
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
      template: "{{entries}}",
      entry: "{key}: {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("print({args})"),
    len: builtin("len({args})"),
    str: builtin("str({args})"),
    range: builtin("range({args})"),
  },
  wrapper: { kind: "none" },
};
