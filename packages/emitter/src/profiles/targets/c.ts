/**
 * C
 *
 * Classes flatten into a struct typedef plus prefixed functions taking the
 * receiver explicitly. There is no dict literal, so dicts are built by a
 * chain of insertion calls.
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

export const cProfile: LanguageProfile = {
  id: "c",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: ";",
  keywords: {
    function: "int",
    classDecl: "struct",
    selfReference: "self",
    noOp: null,
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "int {class}_{name}({params})",
    initializer: "{class}* {class}_new({params})",
    parameter: "int {name}",
    selfParameter: "{class}* self",
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "typedef {keyword} {name} {name};",
    inheritance: null,
    body: "flat",
    bodyPrologue: null,
    trailer: "",
    field: "static int {class}_{name} = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: { keyword: "int", template: "{keyword} {target} = {value}" },
  },
  control: {
    if: "if ({test})",
    elseIf: "else if ({test})",
    else: "else",
    while: "while ({test})",
    forEach: null,
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
    null: "NULL",
    strings: { quote: '"', escape: "\\", interpolation: "" },
  },
  operators: {
    binary: C_BINARY,
    concat: call("strcat({left}, {right})"),
    comparison: C_COMPARISON,
    unary: C_UNARY,
    boolean: C_BOOLEAN,
  },
  expressions: {
    conditional: "{test} ? {body} : {orelse}",
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "self->{attr}",
    selfMethod: "self->{attr}",
    subscript: "{value}[{index}]",
    construct: "{class}_new({args})",
  },
  collections: {
    list: "{{items}}",
    tuple: { template: "{{items}}", singleton: null },
    dict: {
      kind: "insertion",
      factory: "map_new()",
      insert: "map_put({target}, {key}, {value})",
    },
  },
  builtins: {
    print: builtin('printf("{holes}\\n", {args})', {
      byArity: { 0: 'printf("\\n")' },
      separator: ", ",
      hole: "%d",
    }),
    len: unary("sizeof({0}) / sizeof({0}[0])"),
    str: builtin(null),
    range: builtin(null),
  },
  wrapper: {
    kind: "entryFunction",
    prologue: "#include <stdio.h>\n#include <stdbool.h>",
    mainHeader: "int main(void)",
  },
};
