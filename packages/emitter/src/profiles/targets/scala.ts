/**
 * Scala
 */

import type { LanguageProfile } from "../types.js";
import {
  builtin,
  call,
  unary,
  C_BINARY,
  C_BOOLEAN,
  C_COMPARISON,
  C_UNARY,
} from "../rules.js";

export const scalaProfile: LanguageProfile = {
  id: "scala",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: "",
  keywords: {
    function: "def",
    classDecl: "class",
    selfReference: "this",
    noOp: "()",
    break: "break",
    continue: null,
  },
  functions: {
    declaration: "{keyword} {name}({params}) =",
    method: "{keyword} {name}({params}) =",
    initializer: "def this({params}) =",
    parameter: "{name}: Any",
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
    field: "var {name} = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: { keyword: "var", template: "{keyword} {target} = {value}" },
  },
  control: {
    if: "if ({test})",
    elseIf: "else if ({test})",
    else: "else",
    while: "while ({test})",
    forEach: "for ({var} <- {iterable})",
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
    binary: { ...C_BINARY, "**": call("math.pow({left}, {right})") },
    concat: "+",
    comparison: {
      ...C_COMPARISON,
      is: "eq",
      "is not": "ne",
      in: call("{right}.contains({left})"),
      "not in": call("!{right}.contains({left})"),
    },
    unary: C_UNARY,
    boolean: C_BOOLEAN,
  },
  expressions: {
    conditional: "if ({test}) {body} else {orelse}",
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "this.{attr}",
    selfMethod: "this.{attr}",
    subscript: "{value}({index})",
    construct: "new {class}({args})",
  },
  collections: {
    list: "List({items})",
    tuple: { template: "({items})", singleton: "Tuple1({items})" },
    dict: {
      kind: "literal",
      template: "Map({entries})",
      entry: "{key} -> {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("println({args})", { separator: ' + " " + ' }),
    len: unary("{0}.length"),
    str: unary("{0}.toString"),
    range: builtin(null, {
      byArity: { 1: "0 until {0}", 2: "{0} until {1}" },
    }),
  },
  wrapper: {
    kind: "singleClassWithMain",
    classHeader: "object {name}",
    mainHeader: "def main(args: Array[String]): Unit =",
    defaultClassName: "Main",
  },
};
