/**
 * Tests for the tree loader
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { loadTree, convertDocument } from "./loader.js";
import type { AstStatement } from "./types/index.js";

const bodyOf = (json: string): readonly AstStatement[] => {
  const result = loadTree(json, "test.tree.json");
  if (!result.ok) {
    throw new Error(
      result.error.diagnostics.map((d) => d.message).join("; ")
    );
  }
  return result.value.program.body;
};

const program = (...body: readonly unknown[]): string =>
  JSON.stringify({ kind: "program", body });

const name = (id: string) => ({ kind: "name", id });
const constant = (value: unknown) => ({ kind: "constant", value });

describe("Tree loader", () => {
  describe("documents", () => {
    it("should load a bare program node", () => {
      const result = loadTree(
        program({ kind: "assign", target: name("x"), value: constant(5) })
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.program).to.deep.equal({
        kind: "program",
        body: [
          {
            kind: "assign",
            target: { kind: "name", id: "x" },
            value: { kind: "constant", value: 5 },
          },
        ],
      });
      expect(result.value.diagnostics).to.deep.equal([]);
      expect(result.value.source).to.equal(undefined);
    });

    it("should load an envelope and keep its source", () => {
      const result = loadTree(
        JSON.stringify({
          source: "pass\n",
          program: { kind: "program", body: [{ kind: "pass" }] },
        })
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.source).to.equal("pass\n");
      expect(result.value.program.body).to.deep.equal([{ kind: "pass" }]);
    });

    it("should report an unavailable tree and hand back the source", () => {
      const result = loadTree(
        JSON.stringify({
          source: "def broken(:\n",
          error: "invalid syntax (line 1)",
        }),
        "broken.tree.json"
      );

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.source).to.equal("def broken(:\n");
      expect(result.error.diagnostics).to.have.length(1);
      expect(result.error.diagnostics[0]?.code).to.equal("RTG1001");
      expect(result.error.diagnostics[0]?.message).to.equal(
        "Syntax tree unavailable: invalid syntax (line 1)"
      );
      expect(result.error.diagnostics[0]?.location).to.deep.equal({
        file: "broken.tree.json",
        line: 1,
        column: 1,
      });
    });

    it("should reject text that is not JSON", () => {
      const result = loadTree("{ not json");

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.diagnostics[0]?.code).to.equal("RTG1002");
      expect(result.error.source).to.equal(undefined);
    });

    it("should reject a document that is not an object", () => {
      const result = convertDocument([1, 2, 3]);

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.diagnostics[0]?.message).to.equal(
        "Tree document must be a JSON object"
      );
    });

    it("should reject a root that is not a program", () => {
      const result = convertDocument({ program: { kind: "pass" } });

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.diagnostics[0]?.message).to.equal(
        "Tree root must be a program node, found 'pass'"
      );
    });
  });

  describe("parser spellings", () => {
    it("should normalize class-name kinds, operators and locations", () => {
      const body = bodyOf(
        JSON.stringify({
          _type: "Module",
          body: [
            {
              _type: "Expr",
              value: {
                _type: "Call",
                func: { _type: "Name", id: "print" },
                args: [
                  {
                    _type: "BinOp",
                    left: { _type: "Constant", value: 1 },
                    op: { _type: "Add" },
                    right: { _type: "Constant", value: 2 },
                  },
                ],
                lineno: 4,
                col_offset: 2,
              },
            },
          ],
        })
      );

      expect(body).to.deep.equal([
        {
          kind: "expressionStatement",
          expression: {
            kind: "call",
            func: { kind: "name", id: "print" },
            args: [
              {
                kind: "binOp",
                left: { kind: "constant", value: 1 },
                op: "+",
                right: { kind: "constant", value: 2 },
              },
            ],
            location: { line: 4, column: 3 },
          },
        },
      ]);
    });

    it("should turn legacy name constants into constants", () => {
      const body = bodyOf(
        program({
          kind: "expressionStatement",
          expression: {
            kind: "list",
            items: [name("True"), name("False"), name("None")],
          },
        })
      );

      expect(body).to.deep.equal([
        {
          kind: "expressionStatement",
          expression: {
            kind: "list",
            items: [
              { kind: "constant", value: true },
              { kind: "constant", value: false },
              { kind: "constant", value: null },
            ],
          },
        },
      ]);
    });

    it("should read nested parameter lists", () => {
      const body = bodyOf(
        program({
          kind: "FunctionDef",
          name: "greet",
          args: { args: [{ arg: "self" }, { arg: "name" }] },
          body: [{ kind: "Pass" }],
        })
      );

      expect(body).to.deep.equal([
        {
          kind: "functionDef",
          name: "greet",
          params: ["self", "name"],
          body: [{ kind: "pass" }],
        },
      ]);
    });

    it("should accept the short field spellings", () => {
      const body = bodyOf(
        program(
          {
            kind: "For",
            var: name("i"),
            iterable: { kind: "call", func: name("range"), args: [constant(3)] },
            body: [{ kind: "ExprStmt", expr: name("i") }],
          },
          {
            kind: "DictLit",
            pairs: [[constant("a"), constant(1)]],
          }
        )
      );

      expect(body).to.deep.equal([
        {
          kind: "for",
          target: { kind: "name", id: "i" },
          iterable: {
            kind: "call",
            func: { kind: "name", id: "range" },
            args: [{ kind: "constant", value: 3 }],
          },
          body: [
            {
              kind: "expressionStatement",
              expression: { kind: "name", id: "i" },
            },
          ],
        },
        {
          kind: "expressionStatement",
          expression: {
            kind: "dict",
            entries: [
              {
                key: { kind: "constant", value: "a" },
                value: { kind: "constant", value: 1 },
              },
            ],
          },
        },
      ]);
    });

    it("should pair parallel dict keys and values", () => {
      const body = bodyOf(
        program({
          kind: "expressionStatement",
          expression: {
            kind: "Dict",
            keys: [constant("k")],
            values: [constant(true)],
          },
        })
      );

      expect(body[0]).to.deep.equal({
        kind: "expressionStatement",
        expression: {
          kind: "dict",
          entries: [
            {
              key: { kind: "constant", value: "k" },
              value: { kind: "constant", value: true },
            },
          ],
        },
      });
    });

    it("should read both import forms", () => {
      const body = bodyOf(
        program(
          { kind: "Import", names: [{ name: "os" }, { name: "sys" }] },
          { kind: "ImportFrom", module: "math", names: [{ name: "sqrt" }] }
        )
      );

      expect(body).to.deep.equal([
        { kind: "import", module: "os, sys", names: [] },
        { kind: "import", module: "math", names: ["sqrt"] },
      ]);
    });
  });

  describe("unsupported shapes", () => {
    it("should keep unknown expression kinds as placeholders with a warning", () => {
      const result = loadTree(
        program({
          kind: "assign",
          target: name("f"),
          value: { kind: "lambda", location: { line: 2, column: 5 } },
        }),
        "lambda.tree.json"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.program.body).to.deep.equal([
        {
          kind: "assign",
          target: { kind: "name", id: "f" },
          value: {
            kind: "unsupportedExpression",
            sourceKind: "lambda",
            location: { line: 2, column: 5 },
          },
        },
      ]);
      expect(result.value.diagnostics).to.deep.equal([
        {
          code: "RTG2001",
          severity: "warning",
          message: "Node kind 'lambda' is not part of the syntax model",
          location: { file: "lambda.tree.json", line: 2, column: 5 },
          hint: "A placeholder is emitted in its place",
        },
      ]);
    });

    it("should keep unknown statement kinds as placeholders", () => {
      const body = bodyOf(program({ kind: "Try", body: [] }));

      expect(body).to.deep.equal([
        { kind: "unsupportedStatement", sourceKind: "Try" },
      ]);
    });

    it("should treat operators outside the model as unsupported", () => {
      const body = bodyOf(
        program({
          kind: "expressionStatement",
          expression: {
            kind: "binOp",
            left: name("a"),
            op: "MatMult",
            right: name("b"),
          },
        })
      );

      expect(body[0]).to.deep.equal({
        kind: "expressionStatement",
        expression: {
          kind: "unsupportedExpression",
          sourceKind: "binOp MatMult",
        },
      });
    });

    it("should wrap a bare expression in statement position", () => {
      const body = bodyOf(program(name("x")));

      expect(body).to.deep.equal([
        { kind: "expressionStatement", expression: { kind: "name", id: "x" } },
      ]);
    });

    it("should reject loops with an else clause", () => {
      const body = bodyOf(
        program({
          kind: "while",
          test: constant(true),
          body: [{ kind: "break" }],
          orelse: [{ kind: "pass" }],
        })
      );

      expect(body).to.deep.equal([
        { kind: "unsupportedStatement", sourceKind: "while-else" },
      ]);
    });
  });

  describe("malformed nodes", () => {
    it("should fail with the location of a missing field", () => {
      const result = loadTree(
        program({
          kind: "expressionStatement",
          expression: {
            kind: "call",
            func: { kind: "name", location: { line: 3, column: 5 } },
            args: [],
          },
        }),
        "broken.tree.json"
      );

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.diagnostics).to.deep.equal([
        {
          code: "RTG1003",
          severity: "error",
          message: "Node 'name' is missing 'id'",
          location: { file: "broken.tree.json", line: 3, column: 5 },
          hint: "Regenerate the tree with the parser",
        },
      ]);
    });

    it("should require one comparator per operator", () => {
      const result = loadTree(
        program({
          kind: "expressionStatement",
          expression: {
            kind: "compare",
            left: name("a"),
            ops: ["<", "<"],
            comparators: [name("b")],
          },
        })
      );

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.diagnostics[0]?.message).to.equal(
        "Node 'compare' needs one comparator per operator"
      );
    });

    it("should report every malformed node, not just the first", () => {
      const result = loadTree(
        program(
          { kind: "assign", value: constant(1) },
          { kind: "return", value: 7 }
        )
      );

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.diagnostics.map((d) => d.message)).to.deep.equal([
        "Node 'assign' is missing 'target'",
        "Node 'return' has an invalid 'value'",
      ]);
    });
  });
});
