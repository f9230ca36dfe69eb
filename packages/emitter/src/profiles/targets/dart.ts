/**
 * Dart
 */

import type { LanguageProfile } from "../types.js";
import {
  builtin,
  call,
  unary,
  C_BINARY,
  C_BOOLEAN,
  C_COMPARISON,
} from "../rules.js";

export const dartProfile: LanguageProfile = {
  id: "dart",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: ";",
  keywords: {
    function: "dynamic",
    classDecl: "class",
    selfReference: "this",
    noOp: null,
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "{keyword} {name}({params})",
    initializer: "{class}({params})",
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
    field: "static var {name} = {value}",
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
    forEach: "for (var {var} in {iterable})",
    forRange: "for (var {var} = {start}; {var} < {stop}; {var}++)",
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
    binary: { ...C_BINARY, "//": "~/" },
    concat: "+",
    comparison: {
      ...C_COMPARISON,
      is: call("identical({left}, {right})"),
      "is not": call("!identical({left}, {right})"),
      in: call("{right}.contains({left})"),
      "not in": call("!{right}.contains({left})"),
    },
    unary: { not: "!", "-": "-", "+": "", "~": "~" },
    boolean: C_BOOLEAN,
  },
  expressions: {
    conditional: "{test} ? {body} : {orelse}",
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "this.{attr}",
    selfMethod: "this.{attr}",
    subscript: "{value}[{index}]",
    construct: "{class}({args})",
  },
  collections: {
    list: "[{items}]",
    tuple: { template: "[{items}]", singleton: null },
    dict: {
      kind: "literal",
      template: "{{entries}}",
      entry: "{key}: {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("print([{args}].join(' '))", {
      byArity: { 0: "print('')", 1: "print({0})" },
    }),
    len: unary("{0}.length"),
    str: unary("{0}.toString()"),
    range: builtin(null, {
      byArity: {
        1: "List.generate({0}, (i) => i)",
        2: "List.generate({1} - {0}, (i) => {0} + i)",
      },
    }),
  },
  wrapper: { kind: "entryFunction", prologue: null, mainHeader: "void main()" },
};
