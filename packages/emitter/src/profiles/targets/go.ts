/**
 * Go
 *
 * Everything lives in `package main`: classes become struct types with
 * receiver methods and the program body becomes `func main`.
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

export const goProfile: LanguageProfile = {
  id: "go",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: "",
  keywords: {
    function: "func",
    classDecl: "type",
    selfReference: "self",
    noOp: null,
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "func (self *{class}) {name}({params})",
    initializer: "func New{class}({params}) *{class}",
    parameter: "{name} interface{}",
    selfParameter: null,
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name} struct{}",
    inheritance: null,
    body: "flat",
    bodyPrologue: null,
    trailer: "",
    field: "var {class}{name} = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: { keyword: ":=", template: "{target} {keyword} {value}" },
  },
  control: {
    if: "if {test}",
    elseIf: "else if {test}",
    else: "else",
    while: "for {test}",
    forEach: "for _, {var} := range {iterable}",
    forRange: "for {var} := {start}; {var} < {stop}; {var}++",
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
    strings: { quote: '"', escape: "\\", interpolation: "" },
  },
  operators: {
    binary: {
      ...C_BINARY,
      "**": call("math.Pow({left}, {right})"),
    },
    concat: "+",
    comparison: C_COMPARISON,
    unary: { not: "!", "-": "-", "+": "+", "~": "^" },
    boolean: C_BOOLEAN,
  },
  expressions: {
    conditional: null,
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "self.{attr}",
    selfMethod: "self.{attr}",
    subscript: "{value}[{index}]",
    construct: "New{class}({args})",
  },
  collections: {
    list: "[]interface{}{{items}}",
    tuple: { template: "[]interface{}{{items}}", singleton: null },
    dict: {
      kind: "literal",
      template: "map[interface{}]interface{}{{entries}}",
      entry: "{key}: {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("fmt.Println({args})"),
    len: unary("len({0})"),
    str: unary("fmt.Sprint({0})"),
    range: builtin(null),
  },
  wrapper: {
    kind: "packageMainFunc",
    prologue: 'package main\n\nimport "fmt"\n\nfunc main() {',
    epilogue: "}",
    indentBody: true,
  },
};
