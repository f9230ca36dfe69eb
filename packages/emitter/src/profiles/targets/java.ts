/**
 * Java
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

export const javaProfile: LanguageProfile = {
  id: "java",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: ";",
  keywords: {
    function: "public static Object",
    classDecl: "static class",
    selfReference: "this",
    noOp: null,
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "public Object {name}({params})",
    initializer: "public {class}({params})",
    parameter: "Object {name}",
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
    field: "static Object {name} = {value}",
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
    forEach: "for (var {var} : {iterable})",
    forRange: "for (int {var} = {start}; {var} < {stop}; {var}++)",
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
      "//": call("Math.floorDiv({left}, {right})"),
      "**": call("Math.pow({left}, {right})"),
    },
    concat: "+",
    comparison: {
      ...C_COMPARISON,
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
    selfAttribute: "this.{attr}",
    selfMethod: "this.{attr}",
    subscript: "{value}.get({index})",
    construct: "new {class}({args})",
  },
  collections: {
    list: "List.of({items})",
    tuple: { template: "List.of({items})", singleton: null },
    dict: {
      kind: "literal",
      template: "Map.of({entries})",
      entry: "{key}, {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("System.out.println({args})", { separator: ' + " " + ' }),
    len: unary("{0}.size()"),
    str: unary("String.valueOf({0})"),
    range: builtin(null, {
      byArity: {
        1: "IntStream.range(0, {0})",
        2: "IntStream.range({0}, {1})",
      },
    }),
  },
  wrapper: {
    kind: "singleClassWithMain",
    classHeader: "public class {name}",
    mainHeader: "public static void main(String[] args)",
    defaultClassName: "Main",
  },
};
