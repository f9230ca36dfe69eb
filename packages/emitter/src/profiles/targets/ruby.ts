/**
 * Ruby
 */

import type { LanguageProfile } from "../types.js";
import { builtin, call, unary, C_BINARY, C_UNARY } from "../rules.js";

export const rubyProfile: LanguageProfile = {
  id: "ruby",
  blockStyle: "endKeyword",
  blockOpen: "",
  blockClose: "end",
  terminator: "",
  keywords: {
    function: "def",
    classDecl: "class",
    selfReference: "self",
    noOp: "nil",
    break: "break",
    continue: "next",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "{keyword} {name}({params})",
    initializer: "def initialize({params})",
    parameter: "{name}",
    selfParameter: null,
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name}",
    inheritance: { position: "header", template: " < {bases}", bases: "first" },
    body: "block",
    bodyPrologue: null,
    trailer: "",
    field: "@@{name} = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: null,
  },
  control: {
    if: "if {test}",
    elseIf: "elsif {test}",
    else: "else",
    while: "while {test}",
    forEach: "{iterable}.each do |{var}|",
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
    strings: { quote: '"', escape: "\\", interpolation: "#" },
  },
  operators: {
    binary: {
      ...C_BINARY,
      "//": call("{left}.div({right})"),
      "**": "**",
    },
    concat: "+",
    comparison: {
      "==": "==",
      "!=": "!=",
      "<": "<",
      "<=": "<=",
      ">": ">",
      ">=": ">=",
      is: call("{left}.equal?({right})"),
      "is not": call("!{left}.equal?({right})"),
      in: call("{right}.include?({left})"),
      "not in": call("!{right}.include?({left})"),
    },
    unary: C_UNARY,
    boolean: { and: "&&", or: "||" },
  },
  expressions: {
    conditional: "{test} ? {body} : {orelse}",
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "@{attr}",
    selfMethod: "self.{attr}",
    subscript: "{value}[{index}]",
    construct: "{class}.new({args})",
  },
  collections: {
    list: "[{items}]",
    tuple: { template: "[{items}]", singleton: null },
    dict: {
      kind: "literal",
      template: "{ {entries} }",
      entry: "{key} => {value}",
      separator: ", ",
      empty: "{}",
    },
  },
  builtins: {
    print: builtin("puts {args}"),
    len: unary("{0}.length"),
    str: unary("{0}.to_s"),
    range: builtin(null, { byArity: { 1: "(0...{0})", 2: "({0}...{1})" } }),
  },
  wrapper: { kind: "none" },
};
