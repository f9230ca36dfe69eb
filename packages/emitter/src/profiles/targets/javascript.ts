/**
 * JavaScript
 */

import type { LanguageProfile } from "../types.js";
import {
  builtin,
  call,
  unary,
  C_BINARY,
  C_BOOLEAN,
  C_UNARY,
} from "../rules.js";

export const javascriptProfile: LanguageProfile = {
  id: "javascript",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: ";",
  keywords: {
    function: "function",
    classDecl: "class",
    selfReference: "this",
    noOp: null,
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "{name}({params})",
    initializer: "constructor({params})",
    parameter: "{name}",
    selfParameter: null,
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name}",
    inheritance: {
      position: "header",
      template: " extends {bases}",
      bases: "first",
    },
    body: "block",
    bodyPrologue: null,
    trailer: "",
    field: "static {name} = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: { keyword: "let", template: "{keyword} {target} = {value}" },
  },
  control: {
    if: "if ({test})",
    elseIf: "else if ({test})",
    else: "else",
    while: "while ({test})",
    forEach: "for (let {var} of {iterable})",
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
    null: "null",
    strings: { quote: '"', escape: "\\", interpolation: "" },
  },
  operators: {
    binary: {
      ...C_BINARY,
      "//": call("Math.floor({left} / {right})"),
      "**": "**",
    },
    concat: "+",
    comparison: {
      "==": "===",
      "!=": "!==",
      "<": "<",
      "<=": "<=",
      ">": ">",
      ">=": ">=",
      is: "===",
      "is not": "!==",
      in: call("{right}.includes({left})"),
      "not in": call("!{right}.includes({left})"),
    },
    unary: C_UNARY,
    boolean: C_BOOLEAN,
  },
  expressions: {
    conditional: "{test} ? {body} : {orelse}",
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "this.{attr}",
    selfMethod: "this.{attr}",
    subscript: "{value}[{index}]",
    construct: "new {class}({args})",
  },
  collections: {
    list: "[{items}]",
    tuple: { template: "[{items}]", singleton: null },
    dict: {
      kind: "literal",
      template: "{ {entries} }",
      entry: "{key}: {value}",
      separator: ", ",
      empty: "{}",
    },
  },
  builtins: {
    print: builtin("console.log({args})"),
    len: unary("{0}.length"),
    str: unary("String({0})"),
    range: builtin(null, {
      byArity: {
        1: "Array.from({ length: {0} }, (_, i) => i)",
        2: "Array.from({ length: {1} - {0} }, (_, i) => {0} + i)",
      },
    }),
  },
  wrapper: { kind: "none" },
};
