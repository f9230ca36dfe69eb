/**
 * Lua
 *
 * Lua has no `continue` and no compound assignment; both fall back to the
 * emitter's generic handling.
 */

import type { LanguageProfile } from "../types.js";
import { builtin, infix, unary } from "../rules.js";

export const luaProfile: LanguageProfile = {
  id: "lua",
  blockStyle: "endKeyword",
  blockOpen: "",
  blockClose: "end",
  terminator: "",
  keywords: {
    function: "function",
    classDecl: "local",
    selfReference: "self",
    noOp: null,
    break: "break",
    continue: null,
  },
  functions: {
    declaration: "{keyword} {name}({params})",
    method: "function {class}:{name}({params})",
    initializer: "function {class}.new({params})",
    parameter: "{name}",
    selfParameter: null,
    initializerSelfParameter: null,
    parameterPrologue: null,
  },
  classes: {
    header: "{keyword} {name} = {}",
    inheritance: {
      position: "body",
      template: "setmetatable({name}, { __index = {bases} })",
      bases: "first",
    },
    body: "flat",
    bodyPrologue: "{name}.__index = {name}",
    trailer: "",
    field: "{class}.{name} = {value}",
  },
  variables: {
    sigil: "",
    assign: "{target} = {value}",
    declaration: {
      keyword: "local",
      template: "{keyword} {target} = {value}",
    },
  },
  control: {
    if: "if {test} then",
    elseIf: "elseif {test} then",
    else: "else",
    while: "while {test} do",
    forEach: "for _, {var} in ipairs({iterable}) do",
    forRange: "for {var} = {start}, {stop} - 1 do",
  },
  statements: {
    return: "return {value}",
    returnVoid: "return",
    augAssign: null,
  },
  literals: {
    true: "true",
    false: "false",
    null: "nil",
    strings: { quote: '"', escape: "\\", interpolation: "" },
  },
  operators: {
    binary: {
      "+": "+",
      "-": "-",
      "*": "*",
      "/": "/",
      "//": "//",
      "%": "%",
      "**": "^",
      "<<": "<<",
      ">>": ">>",
      "&": "&",
      "|": "|",
      "^": "~",
    },
    concat: infix("..", "shift"),
    comparison: {
      "==": "==",
      "!=": "~=",
      "<": "<",
      "<=": "<=",
      ">": ">",
      ">=": ">=",
      is: "==",
      "is not": "~=",
      in: null,
      "not in": null,
    },
    unary: { not: "not", "-": "-", "+": "", "~": "~" },
    boolean: { and: "and", or: "or" },
  },
  expressions: {
    conditional: "{test} and {body} or {orelse}",
    attribute: "{value}.{attr}",
    method: "{value}:{attr}",
    selfAttribute: "self.{attr}",
    selfMethod: "self:{attr}",
    subscript: "{value}[{index}]",
    construct: "{class}.new({args})",
  },
  collections: {
    list: "{{items}}",
    tuple: { template: "{{items}}", singleton: null },
    dict: {
      kind: "literal",
      template: "{{entries}}",
      entry: "[{key}] = {value}",
      separator: ", ",
      empty: null,
    },
  },
  builtins: {
    print: builtin("print({args})"),
    len: unary("#{0}"),
    str: unary("tostring({0})"),
    range: builtin(null),
  },
  wrapper: { kind: "none" },
};
