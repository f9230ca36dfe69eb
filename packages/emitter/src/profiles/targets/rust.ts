/**
 * Rust
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

export const rustProfile: LanguageProfile = {
  id: "rust",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: ";",
  keywords: {
    function: "fn",
    classDecl: "struct",
    selfReference: "self",
    noOp: null,
    break: "break",
    continue: "continue",
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "fn {name}({params})",
    initializer: "fn new({params}) -> Self",
    parameter: "{name}: i64",
    selfParameter: "&self",
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name};\nimpl {name}",
    inheritance: null,
    body: "block",
    bodyPrologue: null,
    trailer: "",
    field: "const {name}: i64 = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: {
      keyword: "let mut",
      template: "{keyword} {target} = {value}",
    },
  },
  control: {
    if: "if {test}",
    elseIf: "else if {test}",
    else: "else",
    while: "while {test}",
    forEach: "for {var} in {iterable}",
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
    null: "None",
    strings: { quote: '"', escape: "\\", interpolation: "" },
  },
  operators: {
    binary: {
      ...C_BINARY,
      "**": call("{left}.pow({right})"),
    },
    concat: call('format!("{}{}", {left}, {right})'),
    comparison: {
      ...C_COMPARISON,
      in: call("{right}.contains(&{left})"),
      "not in": call("!{right}.contains(&{left})"),
    },
    unary: { not: "!", "-": "-", "+": "", "~": "!" },
    boolean: C_BOOLEAN,
  },
  expressions: {
    conditional: "if {test} { {body} } else { {orelse} }",
    attribute: "{value}.{attr}",
    method: "{value}.{attr}",
    selfAttribute: "self.{attr}",
    selfMethod: "self.{attr}",
    subscript: "{value}[{index}]",
    construct: "{class}::new({args})",
  },
  collections: {
    list: "vec![{items}]",
    tuple: { template: "({items})", singleton: "({items},)" },
    dict: {
      kind: "literal",
      template: "HashMap::from([{entries}])",
      entry: "({key}, {value})",
      separator: ", ",
      empty: "HashMap::new()",
    },
  },
  builtins: {
    print: builtin('println!("{holes}", {args})', {
      byArity: { 0: "println!()" },
      hole: "{}",
    }),
    len: unary("{0}.len()"),
    str: unary("{0}.to_string()"),
    range: builtin(null, { byArity: { 1: "0..{0}", 2: "{0}..{1}" } }),
  },
  wrapper: { kind: "entryFunction", prologue: null, mainHeader: "fn main()" },
};
