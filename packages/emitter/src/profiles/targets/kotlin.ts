/**
 * Kotlin
 *
 * Bitwise operators are infix functions (`shl`, `and`, `xor`), so they
 * never take the compound assignment form.
 */

import type { LanguageProfile } from "../types.js";
import { builtin, call, unary, C_BOOLEAN } from "../rules.js";

export const kotlinProfile: LanguageProfile = {
  id: "kotlin",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: "",
  keywords: {
    function: "fun",
    classDecl: "open class",
    selfReference: "this",
    noOp: null,
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "fun {name}({params})",
    initializer: "constructor({params})",
    parameter: "{name}: Any",
    selfParameter: null,
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name}",
    inheritance: { position: "header", template: " : {bases}()", bases: "first" },
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
    forEach: "for ({var} in {iterable})",
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
    strings: { quote: '"', escape: "\\", interpolation: "$" },
  },
  operators: {
    binary: {
      "+": "+",
      "-": "-",
      "*": "*",
      "/": "/",
      "//": "/",
      "%": "%",
      "**": call("Math.pow({left}, {right})"),
      "<<": "shl",
      ">>": "shr",
      "&": "and",
      "|": "or",
      "^": "xor",
    },
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
      in: "in",
      "not in": "!in",
    },
    unary: { not: "!", "-": "-", "+": "+", "~": call("{operand}.inv()") },
    boolean: C_BOOLEAN,
  },
  expressions: {
    conditional: "if ({test}) {body} else {orelse}",
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "this.{attr}",
    selfMethod: "this.{attr}",
    subscript: "{value}[{index}]",
    construct: "{class}({args})",
  },
  collections: {
    list: "listOf({items})",
    tuple: { template: "listOf({items})", singleton: null },
    dict: {
      kind: "literal",
      template: "mapOf({entries})",
      entry: "{key} to {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("println({args})", { separator: ' + " " + ' }),
    len: unary("{0}.size"),
    str: unary("{0}.toString()"),
    range: builtin(null, {
      byArity: { 1: "0 until {0}", 2: "{0} until {1}" },
    }),
  },
  wrapper: { kind: "entryFunction", prologue: null, mainHeader: "fun main()" },
};
