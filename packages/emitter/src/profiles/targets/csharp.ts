/**
 * C#
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

export const csharpProfile: LanguageProfile = {
  id: "csharp",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: ";",
  keywords: {
    function: "public static object",
    classDecl: "class",
    selfReference: "this",
    noOp: null,
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "public object {name}({params})",
    initializer: "public {class}({params})",
    parameter: "dynamic {name}",
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
    field: "public static object {name} = {value}",
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
    forEach: "foreach (var {var} in {iterable})",
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
    strings: { quote: '"', escape: "\\", interpolation: "" },
  },
  operators: {
    binary: {
      ...C_BINARY,
      "**": call("Math.Pow({left}, {right})"),
    },
    concat: "+",
    comparison: {
      ...C_COMPARISON,
      in: call("{right}.Contains({left})"),
      "not in": call("!{right}.Contains({left})"),
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
    list: "new List<object> {{items}}",
    tuple: { template: "({items})", singleton: "Tuple.Create({items})" },
    dict: {
      kind: "literal",
      template: "new Dictionary<object, object> {{entries}}",
      entry: "[{key}] = {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("Console.WriteLine({args})", { separator: ' + " " + ' }),
    len: unary("{0}.Count"),
    str: unary("{0}.ToString()"),
    range: builtin(null, {
      byArity: {
        1: "Enumerable.Range(0, {0})",
        2: "Enumerable.Range({0}, {1} - {0})",
      },
    }),
  },
  wrapper: {
    kind: "singleClassWithMain",
    classHeader: "class {name}",
    mainHeader: "static void Main(string[] args)",
    defaultClassName: "Program",
  },
};
