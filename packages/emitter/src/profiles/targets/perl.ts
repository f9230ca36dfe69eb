/**
 * Perl
 *
 * Subroutines take their arguments from `@_`, so parameters are bound by a
 * prologue line instead of the signature.
 */

import type { LanguageProfile } from "../types.js";
import { builtin, call, unary, C_BINARY, C_COMPARISON } from "../rules.js";

export const perlProfile: LanguageProfile = {
  id: "perl",
  blockStyle: "brace",
  blockOpen: " {",
  blockClose: "}",
  terminator: ";",
  keywords: {
    function: "sub",
    classDecl: "package",
    selfReference: "$self",
    noOp: null,
    break: "last",
    continue: "next",
  },
  functions: {
    declaration: "{keyword} {name}",
    method: "{keyword} {name}",
    initializer: "sub new",
    parameter: "{name}",
    selfParameter: "$self",
    initializerSelfParameter: "$class",
    parameterPrologue: "my ({params}) = @_;",
  },
  classes: {
    header: "{keyword} {name};",
    inheritance: {
      position: "body",
      template: "use parent -norequire, '{bases}';",
      bases: "first",
    },
    body: "flat",
    bodyPrologue: null,
    trailer: "",
    field: "our ${name} = {value}",
  },
  variables: {
    sigil: "$",
    assign: "{target} = {value}",
    declaration: { keyword: "my", template: "{keyword} {target} = {value}" },
  },
  control: {
    if: "if ({test})",
    elseIf: "elsif ({test})",
    else: "else",
    while: "while ({test})",
    forEach: "foreach my {var} (@{{iterable}})",
    forRange: "for my {var} ({start} .. {stop} - 1)",
  },
  statements: {
    return: "return {value}",
    returnVoid: "return",
    augAssign: "{target} {op}= {value}",
  },
  literals: {
    true: "1",
    false: "0",
    null: "undef",
    strings: { quote: '"', escape: "\\", interpolation: "$@" },
  },
  operators: {
    binary: {
      ...C_BINARY,
      "//": call("int({left} / {right})"),
      "**": "**",
    },
    concat: ".",
    comparison: {
      ...C_COMPARISON,
      in: call("grep { $_ eq {left} } @{{right}}"),
      "not in": call("!grep { $_ eq {left} } @{{right}}"),
    },
    unary: { not: "!", "-": "-", "+": "+", "~": "~" },
    boolean: { and: "&&", or: "||" },
  },
  expressions: {
    conditional: "{test} ? {body} : {orelse}",
    attribute: "{value}->{{attr}}",
    method: "{value}->{attr}",
    selfAttribute: "$self->{{attr}}",
    selfMethod: "$self->{attr}",
    subscript: "{value}->[{index}]",
    construct: "{class}->new({args})",
  },
  collections: {
    list: "[{items}]",
    tuple: { template: "[{items}]", singleton: null },
    dict: {
      kind: "literal",
      template: "{ {entries} }",
      entry: "{key} => {value}",
      separator: ", ",
      empty: "{}",
    },
  },
  builtins: {
    print: builtin('print {args}, "\\n"', {
      byArity: { 0: 'print "\\n"' },
      separator: ', " ", ',
    }),
    len: unary("scalar(@{{0}})"),
    str: unary("'' . {0}"),
    range: builtin(null, {
      byArity: { 1: "(0 .. {0} - 1)", 2: "({0} .. {1} - 1)" },
    }),
  },
  wrapper: {
    kind: "scriptTag",
    prologue: "use strict;\nuse warnings;",
    epilogue: "",
    indentBody: false,
  },
};
