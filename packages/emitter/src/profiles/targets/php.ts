/**
 * PHP
 */

import type { LanguageProfile } from "../types.js";
import {
  builtin,
  call,
  infix,
  unary,
  C_BINARY,
  C_BOOLEAN,
  C_UNARY,
} from "../rules.js";

export const phpProfile: LanguageProfile = {
  id: "php",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: ";",
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
    method: "public function {name}({params})",
    initializer: "public function __construct({params})",
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
    field: "public static ${name} = {value}",
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
    forEach: "foreach ({iterable} as {var})",
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
      ...C_BINARY,
      "//": call("intdiv({left}, {right})"),
      "**": "**",
    },
    concat: infix(".", "bitAnd"),
    comparison: {
      "==": "===",
      "!=": "!==",
      "<": "<",
      "<=": "<=",
      ">": ">",
      ">=": ">=",
      is: "===",
      "is not": "!==",
      in: call("in_array({left}, {right})"),
      "not in": call("!in_array({left}, {right})"),
    },
    unary: C_UNARY,
    boolean: C_BOOLEAN,
  },
  expressions: {
    conditional: "{test} ? {body} : {orelse}",
    attribute: "{value}->{attr}",
    method: "{value}->{attr}",
    selfAttribute: "$this->{attr}",
    selfMethod: "$this->{attr}",
    subscript: "{value}[{index}]",
    construct: "new {class}({args})",
  },
  collections: {
    list: "[{items}]",
    tuple: { template: "[{items}]", singleton: null },
    dict: {
      kind: "literal",
      template: "[{entries}]",
      entry: "{key} => {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("echo {args}, PHP_EOL", {
      byArity: { 0: "echo PHP_EOL" },
      separator: ', " ", ',
    }),
    len: unary("count({0})"),
    str: unary("strval({0})"),
    range: builtin(null, {
      byArity: { 1: "range(0, {0} - 1)", 2: "range({0}, {1} - 1)" },
    }),
  },
  wrapper: {
    kind: "scriptTag",
    prologue: "<?php",
    epilogue: "?>",
    indentBody: false,
  },
};
