/**
 * C++
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

export const cppProfile: LanguageProfile = {
  id: "cpp",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: ";",
  keywords: {
    function: "auto",
    classDecl: "class",
    selfReference: "this",
    noOp: null,
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "auto {name}({params})",
    initializer: "{class}({params})",
    parameter: "auto {name}",
    selfParameter: null,
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name}",
    inheritance: {
      position: "header",
      template: " : public {bases}",
      bases: "first",
    },
    body: "block",
    bodyPrologue: "public:",
    trailer: ";",
    field: "static inline auto {name} = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: { keyword: "auto", template: "{keyword} {target} = {value}" },
  },
  control: {
    if: "if ({test})",
    elseIf: "else if ({test})",
    else: "else",
    while: "while ({test})",
    forEach: "for (auto {var} : {iterable})",
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
    null: "nullptr",
    strings: { quote: '"', escape: "\\", interpolation: "" },
  },
  operators: {
    binary: {
      ...C_BINARY,
      "**": call("std::pow({left}, {right})"),
    },
    concat: "+",
    comparison: {
      ...C_COMPARISON,
      in: call(
        "std::find({right}.begin(), {right}.end(), {left}) != {right}.end()"
      ),
      "not in": call(
        "std::find({right}.begin(), {right}.end(), {left}) == {right}.end()"
      ),
    },
    unary: C_UNARY,
    boolean: C_BOOLEAN,
  },
  expressions: {
    conditional: "{test} ? {body} : {orelse}",
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "this->{attr}",
    selfMethod: "this->{attr}",
    subscript: "{value}[{index}]",
    construct: "{class}({args})",
  },
  collections: {
    list: "std::vector{{items}}",
    tuple: { template: "std::make_tuple({items})", singleton: null },
    dict: {
      kind: "literal",
      template: "std::map{{entries}}",
      entry: "{{key}, {value}}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("std::cout << {args} << std::endl", {
      byArity: { 0: "std::cout << std::endl" },
      separator: ' << " " << ',
    }),
    len: unary("{0}.size()"),
    str: unary("std::to_string({0})"),
    range: builtin(null, {
      byArity: {
        1: "std::views::iota(0, {0})",
        2: "std::views::iota({0}, {1})",
      },
    }),
  },
  wrapper: {
    kind: "entryFunction",
    prologue: "#include <iostream>",
    mainHeader: "int main()",
  },
};
