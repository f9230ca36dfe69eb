/**
 * Swift
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

export const swiftProfile: LanguageProfile = {
  id: "swift",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: "",
  keywords: {
    function: "func",
    classDecl: "class",
    selfReference: "self",
    noOp: "()",
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "{keyword} {name}({params})",
    initializer: "init({params})",
    parameter: "_ {name}: Any",
    selfParameter: null,
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name}",
    inheritance: { position: "header", template: ": {bases}", bases: "all" },
    body: "block",
    bodyPrologue: null,
    trailer: "",
    field: "static var {name} = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: { keyword: "var", template: "{keyword} {target} = {value}" },
  },
  control: {
    if: "if {test}",
    elseIf: "else if {test}",
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
    null: "nil",
    strings: { quote: '"', escape: "\\", interpolation: "" },
  },
  operators: {
    binary: C_BINARY,
    concat: "+",
    comparison: {
      "==": "==",
      "!=": "!=",
      "<": "<",
      "<=": "<=",
      ">": ">",
      ">=": ">=",
      is: "===",
      "is not": "!==",
      in: call("{right}.contains({left})"),
      "not in": call("!{right}.contains({left})"),
    },
    unary: C_UNARY,
    boolean: C_BOOLEAN,
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
    tuple: { template: "({items})", singleton: null },
    dict: {
      kind: "literal",
      template: "[{entries}]",
      entry: "{key}: {value}",
      separator: ", ",
      empty: "[:]",
    },
  },
  builtins: {
    print: builtin("print({args})"),
    len: unary("{0}.count"),
    str: unary("String({0})"),
    range: builtin(null, { byArity: { 1: "0..<{0}", 2: "{0}..<{1}" } }),
  },
  wrapper: { kind: "none" },
};
