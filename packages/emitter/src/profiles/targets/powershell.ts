/**
 * PowerShell
 *
 * Operators are dashed words (`-eq`, `-band`) and the string escape is the
 * backtick.
 */

import type { LanguageProfile } from "../types.js";
import { builtin, call, unary } from "../rules.js";

export const powershellProfile: LanguageProfile = {
  id: "powershell",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: "",
  keywords: {
    function: "function",
    classDecl: "class",
    selfReference: "$this",
    noOp: null,
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "[object] {name}({params})",
    initializer: "{class}({params})",
    parameter: "{name}",
    selfParameter: null,
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name}",
    inheritance: { position: "header", template: " : {bases}", bases: "first" },
    body: "block",
    bodyPrologue: null,
    trailer: "",
    field: "static [object] ${name} = {value}",
  },
  variables: {
    sigil: "$",
    assign: "{target} = {value}",
    declaration: null,
  },
  control: {
    if: "if ({test})",
    elseIf: "elseif ({test})",
    else: "else",
    while: "while ({test})",
    forEach: "foreach ({var} in {iterable})",
    forRange: "for ({var} = {start}; {var} -lt {stop}; {var}++)",
  },
  statements: {
    return: "return {value}",
    returnVoid: "return",
    augAssign: "{target} {op}= {value}",
  },
  literals: {
    true: "$true",
    false: "$false",
    null: "$null",
    strings: { quote: '"', escape: "`", interpolation: "$" },
  },
  operators: {
    binary: {
      "+": "+",
      "-": "-",
      "*": "*",
      "/": "/",
      "//": call("[math]::Floor({left} / {right})"),
      "%": "%",
      "**": call("[math]::Pow({left}, {right})"),
      "<<": "-shl",
      ">>": "-shr",
      "&": "-band",
      "|": "-bor",
      "^": "-bxor",
    },
    concat: "+",
    comparison: {
      "==": "-eq",
      "!=": "-ne",
      "<": "-lt",
      "<=": "-le",
      ">": "-gt",
      ">=": "-ge",
      is: "-eq",
      "is not": "-ne",
      in: "-in",
      "not in": "-notin",
    },
    unary: { not: "-not", "-": "-", "+": "+", "~": "-bnot" },
    boolean: { and: "-and", or: "-or" },
  },
  expressions: {
    conditional: "$(if ({test}) { {body} } else { {orelse} })",
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "$this.{attr}",
    selfMethod: "$this.{attr}",
    subscript: "{value}[{index}]",
    construct: "[{class}]::new({args})",
  },
  collections: {
    list: "@({items})",
    tuple: { template: "@({items})", singleton: null },
    dict: {
      kind: "literal",
      template: "@{ {entries} }",
      entry: "{key} = {value}",
      separator: "; ",
      empty: "@{}",
    },
  },
  builtins: {
    print: builtin("Write-Host {args}", { separator: " " }),
    len: unary("{0}.Count"),
    str: unary("[string]{0}"),
    range: builtin(null, {
      byArity: { 1: "0..({0} - 1)", 2: "{0}..({1} - 1)" },
    }),
  },
  wrapper: { kind: "none" },
};
