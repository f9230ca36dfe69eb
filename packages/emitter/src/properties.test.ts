/**
 * Properties every target profile must hold
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { AstStatement } from "@retarget/frontend";
import { emitProgram } from "./emitter.js";
import { emitStatement } from "./statement-emitter.js";
import { PLACEHOLDER_TOKEN } from "./constants.js";
import { PROFILES, TARGET_IDS } from "./profiles/index.js";
import {
  assign,
  attribute,
  augAssign,
  binOp,
  boolOp,
  breakStatement,
  call,
  classDef,
  compare,
  conditional,
  constant,
  continueStatement,
  contextFor,
  dict,
  emit,
  expressionStatement,
  forStatement,
  functionDef,
  ifStatement,
  importStatement,
  list,
  pass,
  print,
  program,
  returnStatement,
  subscript,
  tuple,
  unaryOp,
  unsupportedExpression,
  unsupportedStatement,
  whileStatement,
} from "./testing/nodes.js";

/** One of every statement and expression kind */
const everyKind: readonly AstStatement[] = [
  importStatement("math", "sqrt"),
  classDef(
    "Counter",
    ["Base"],
    assign("start", constant(0)),
    functionDef("__init__", ["self", "step"], assign(attribute("self", "step"), "step")),
    functionDef(
      "advance",
      ["self"],
      augAssign(attribute("self", "count"), "+", attribute("self", "step")),
      returnStatement(attribute("self", "count"))
    )
  ),
  functionDef(
    "describe",
    ["items"],
    assign("total", constant(0)),
    forStatement(
      "item",
      "items",
      ifStatement(
        compare("item", ["<", constant(0)]),
        [continueStatement],
        [
          ifStatement(
            boolOp("and", compare("item", [">", constant(100)]), unaryOp("not", "total")),
            [breakStatement]
          ),
        ]
      ),
      augAssign("total", "+", "item")
    ),
    returnStatement(conditional("total", call("str", "total"), constant(null)))
  ),
  assign("values", list(constant(1), constant(2.5), constant(-3))),
  assign("pair", tuple(constant("a"), constant(true))),
  assign("table", dict([constant("k"), constant(false)])),
  assign("n", binOp(call("len", "values"), "*", unaryOp("-", constant(2)))),
  whileStatement(compare("n", [">", constant(0)]), augAssign("n", "-", constant(1))),
  forStatement("i", call("range", constant(1), constant(4)), print("i", subscript("values", constant(0)))),
  expressionStatement(call("describe", "values")),
  expressionStatement(unsupportedExpression("lambda")),
  unsupportedStatement("try"),
  pass,
  returnStatement(),
];

const braceTargets = TARGET_IDS.filter(
  (target) => PROFILES[target].blockStyle === "brace"
);

describe("Profile properties", () => {
  it("should emit every node kind for every target", () => {
    for (const target of TARGET_IDS) {
      const result = emitProgram(program(...everyKind), target);

      expect(result.ok, target).to.equal(true);
      if (result.ok) {
        expect(result.value.code, target).to.not.equal("");
        expect(result.value.target).to.equal(target);
      }
    }
  });

  it("should emit byte-identical output on repeated runs", () => {
    for (const target of TARGET_IDS) {
      expect(emit(target, everyKind), target).to.deep.equal(
        emit(target, everyKind)
      );
    }
  });

  it("should report each unsupported node as a placeholder diagnostic", () => {
    for (const target of TARGET_IDS) {
      const result = emit(target, [
        expressionStatement(unsupportedExpression("lambda")),
        unsupportedStatement("try"),
      ]);

      const placeholders = result.diagnostics.filter(
        (diagnostic) => diagnostic.code === "RTG2002"
      );
      expect(placeholders, target).to.have.length(2);
      expect(result.code.split(PLACEHOLDER_TOKEN), target).to.have.length(3);
    }
  });

  it("should balance block delimiters for brace targets", () => {
    expect(braceTargets).to.include("javascript");
    for (const target of braceTargets) {
      const result = emit(target, everyKind);
      const codes = result.diagnostics.map((diagnostic) => diagnostic.code);

      expect(codes, target).to.not.include("RTG4001");
    }
  });

  it("should declare a variable only on its first assignment", () => {
    for (const target of TARGET_IDS) {
      const first = assign("x", constant(1));
      const second = assign("x", constant(2));
      const [firstText, afterFirst] = emitStatement(
        first,
        contextFor(target, [first, second])
      );
      const [secondText] = emitStatement(second, afterFirst);
      const [plainText] = emitStatement(second, contextFor(target));

      if (PROFILES[target].variables.declaration === null) {
        expect(firstText.replace("1", "2"), target).to.equal(secondText);
      } else {
        expect(firstText.replace("1", "2"), target).to.not.equal(secondText);
        expect(plainText, target).to.equal(firstText.replace("1", "2"));
      }
    }
  });

  it("should emit a valid block for an empty function body", () => {
    for (const target of TARGET_IDS) {
      const code = emit(target, [functionDef("noop", [])]).code;

      expect(code, target).to.include("noop");
      expect(code, target).to.not.include(PLACEHOLDER_TOKEN);
    }
  });
});
