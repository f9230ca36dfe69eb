/**
 * Tests for statement emission across target profiles
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { AstStatement } from "@retarget/frontend";
import { emitStatement } from "./statement-emitter.js";
import { PLACEHOLDER_TOKEN } from "./constants.js";
import {
  assign,
  attribute,
  augAssign,
  binOp,
  breakStatement,
  call,
  classDef,
  compare,
  constant,
  contextFor,
  continueStatement,
  forStatement,
  functionDef,
  ifStatement,
  importStatement,
  pass,
  print,
  returnStatement,
  statementText,
  tuple,
  unsupportedStatement,
  whileStatement,
} from "./testing/nodes.js";

const dogClass = classDef(
  "Dog",
  ["Animal"],
  assign("sound", constant("woof")),
  functionDef(
    "__init__",
    ["self", "name"],
    assign(attribute("self", "name"), "name")
  ),
  functionDef("speak", ["self"], print(attribute("self", "name")))
);

describe("Statement Emitter", () => {
  describe("functions", () => {
    it("should emit a brace-style function", () => {
      const stmt = functionDef("greet", ["name"], print("name"));

      expect(statementText("javascript", stmt)).to.equal(
        "function greet(name) {\n    console.log(name);\n}"
      );
    });

    it("should emit typed parameters through the parameter template", () => {
      const stmt = functionDef("add", ["a", "b"], returnStatement(binOp("a", "+", "b")));

      expect(statementText("rust", stmt)).to.equal(
        "fn add(a: i64, b: i64) {\n    return a + b;\n}"
      );
    });

    it("should bind parameters in a prologue where the target needs one", () => {
      const stmt = functionDef("greet", ["name"], print("name"));

      expect(statementText("perl", stmt)).to.equal(
        'sub greet {\n    my ($name) = @_;\n    print $name, "\\n";\n}'
      );
    });

    it("should emit one no-op line for an empty body", () => {
      const stmt = functionDef("noop", []);

      expect(statementText("javascript", stmt)).to.equal(
        "function noop() {\n    ;\n}"
      );
      expect(statementText("python", stmt)).to.equal("def noop():\n    pass");
      expect(statementText("ruby", stmt)).to.equal("def noop()\n    nil\nend");
    });

    it("should emit a body holding only pass like an empty body", () => {
      const stmt = functionDef("noop", [], pass);

      expect(statementText("python", stmt)).to.equal("def noop():\n    pass");
      expect(statementText("javascript", stmt)).to.equal(
        "function noop() {\n    ;\n}"
      );
    });
  });

  describe("classes", () => {
    it("should round-trip a class to the origin language", () => {
      expect(statementText("python", dogClass)).to.equal(
        [
          "class Dog(Animal):",
          '    sound = "woof"',
          "",
          "    def __init__(self, name):",
          "        self.name = name",
          "",
          "    def speak(self):",
          "        print(self.name)",
        ].join("\n")
      );
    });

    it("should rename the initializer and drop the receiver", () => {
      expect(statementText("javascript", dogClass)).to.equal(
        [
          "class Dog extends Animal {",
          '    static sound = "woof";',
          "",
          "    constructor(name) {",
          "        this.name = name;",
          "    }",
          "",
          "    speak() {",
          "        console.log(this.name);",
          "    }",
          "}",
        ].join("\n")
      );
    });

    it("should close end-keyword classes", () => {
      expect(statementText("ruby", dogClass)).to.equal(
        [
          "class Dog < Animal",
          '    @@sound = "woof"',
          "",
          "    def initialize(name)",
          "        @name = name",
          "    end",
          "",
          "    def speak()",
          "        puts @name",
          "    end",
          "end",
        ].join("\n")
      );
    });

    it("should emit flat classes with members at the same depth", () => {
      const stmt = classDef(
        "Dog",
        [],
        functionDef(
          "__init__",
          ["self", "name"],
          assign(attribute("self", "name"), "name")
        ),
        functionDef("speak", ["self"], print(attribute("self", "name")))
      );

      expect(statementText("lua", stmt)).to.equal(
        [
          "local Dog = {}",
          "Dog.__index = Dog",
          "",
          "function Dog.new(name)",
          "    self.name = name",
          "end",
          "",
          "function Dog:speak()",
          "    print(self.name)",
          "end",
        ].join("\n")
      );
    });

    it("should put body-position inheritance after the header", () => {
      const stmt = classDef("Puppy", ["Dog"], functionDef("speak", ["self"], pass));

      expect(statementText("perl", stmt)).to.equal(
        [
          "package Puppy;",
          "use parent -norequire, 'Dog';",
          "",
          "sub speak {",
          "    my ($self) = @_;",
          "    ;",
          "}",
        ].join("\n")
      );
    });

    it("should pass the receiver as an explicit parameter in C", () => {
      const stmt = classDef(
        "Counter",
        [],
        functionDef("bump", ["self"], augAssign(attribute("self", "n"), "+", constant(1)))
      );

      expect(statementText("c", stmt)).to.equal(
        [
          "typedef struct Counter Counter;",
          "",
          "int Counter_bump(Counter* self) {",
          "    self->n += 1;",
          "}",
        ].join("\n")
      );
    });

    it("should emit only the header of an empty flat class", () => {
      expect(statementText("go", classDef("Empty", []))).to.equal(
        "type Empty struct{}"
      );
    });

    it("should emit a no-op in an empty block class", () => {
      expect(statementText("python", classDef("Empty", []))).to.equal(
        "class Empty:\n    pass"
      );
      expect(statementText("java", classDef("Empty", []))).to.equal(
        "static class Empty {\n    ;\n}"
      );
    });

    it("should qualify flat class fields with the class name", () => {
      const stmt = classDef("Config", [], assign("debug", constant(false)));

      expect(statementText("lua", stmt)).to.equal(
        "local Config = {}\nConfig.__index = Config\n\nConfig.debug = false"
      );
    });
  });

  describe("assignments", () => {
    it("should declare on first sight only", () => {
      const stmts = [assign("x", constant(5)), assign("x", constant(6))];
      let context = contextFor("go", stmts);
      const lines: string[] = [];
      for (const stmt of stmts) {
        const [code, next] = emitStatement(stmt, context);
        lines.push(code);
        context = next;
      }

      expect(lines).to.deep.equal(["x := 5", "x = 6"]);
    });

    it("should declare a tuple of new names at once", () => {
      const stmt = assign(tuple("a", "b"), tuple(constant(1), constant(2)));

      expect(statementText("javascript", stmt)).to.equal("let [a, b] = [1, 2];");
    });

    it("should declare the new names of a partly bound tuple first", () => {
      const stmts = [
        assign("a", constant(1)),
        assign(tuple("a", "b"), tuple(constant(2), constant(3))),
        assign("b", constant(4)),
      ];
      let context = contextFor("javascript", stmts);
      const lines: string[] = [];
      for (const stmt of stmts) {
        const [code, next] = emitStatement(stmt, context);
        lines.push(code);
        context = next;
      }

      expect(lines).to.deep.equal([
        "let a = 1;",
        "let b = null;\n[a, b] = [2, 3];",
        "b = 4;",
      ]);
    });

    it("should not declare attribute targets", () => {
      const stmt = assign(attribute("self", "x"), constant(1));

      expect(statementText("kotlin", stmt)).to.equal("this.x = 1");
    });

    it("should not redeclare parameters", () => {
      const stmt = functionDef("reset", ["count"], assign("count", constant(0)));

      expect(statementText("javascript", stmt)).to.equal(
        "function reset(count) {\n    count = 0;\n}"
      );
    });

    it("should use the compound form for symbolic operators", () => {
      expect(statementText("javascript", augAssign("x", "+", constant(1)))).to.equal(
        "x += 1;"
      );
      expect(statementText("python", augAssign("x", "//", constant(2)))).to.equal(
        "x //= 2"
      );
      expect(
        statementText("php", augAssign("s", "+", constant("!")))
      ).to.equal('$s .= "!";');
    });

    it("should expand augmented assignment without a compound form", () => {
      expect(statementText("lua", augAssign("x", "+", constant(1)))).to.equal(
        "x = x + 1"
      );
      expect(
        statementText("javascript", augAssign("x", "//", constant(2)))
      ).to.equal("x = Math.floor(x / 2);");
      expect(
        statementText("lua", augAssign("x", "*", binOp("y", "+", constant(1))))
      ).to.equal("x = x * (y + 1)");
    });

    it("should never declare in an augmented assignment", () => {
      expect(statementText("swift", augAssign("total", "-", "step"))).to.equal(
        "total -= step"
      );
    });
  });

  describe("conditionals", () => {
    const chain = ifStatement(
      "a",
      [print(constant(1))],
      [ifStatement("b", [print(constant(2))], [print(constant(3))])]
    );

    it("should continue brace chains on the closing line", () => {
      expect(statementText("javascript", chain)).to.equal(
        [
          "if (a) {",
          "    console.log(1);",
          "} else if (b) {",
          "    console.log(2);",
          "} else {",
          "    console.log(3);",
          "}",
        ].join("\n")
      );
    });

    it("should flatten elif chains for indentation targets", () => {
      expect(statementText("python", chain)).to.equal(
        [
          "if a:",
          "    print(1)",
          "elif b:",
          "    print(2)",
          "else:",
          "    print(3)",
        ].join("\n")
      );
    });

    it("should close end-keyword chains once", () => {
      expect(statementText("ruby", chain)).to.equal(
        [
          "if a",
          "    puts 1",
          "elsif b",
          "    puts 2",
          "else",
          "    puts 3",
          "end",
        ].join("\n")
      );
    });

    it("should keep an else holding more than an if as a plain else", () => {
      const stmt = ifStatement(
        "a",
        [pass],
        [ifStatement("b", [pass]), print("c")]
      );

      expect(statementText("python", stmt)).to.equal(
        [
          "if a:",
          "    pass",
          "else:",
          "    if b:",
          "        pass",
          "    print(c)",
        ].join("\n")
      );
    });

    it("should emit a no-op for an empty branch", () => {
      expect(statementText("python", ifStatement("ready", []))).to.equal(
        "if ready:\n    pass"
      );
    });
  });

  describe("loops", () => {
    it("should use the counting loop for range where the target has one", () => {
      const stmt = forStatement("i", call("range", constant(3)), print("i"));

      expect(statementText("java", stmt)).to.equal(
        "for (int i = 0; i < 3; i++) {\n    System.out.println(i);\n}"
      );
    });

    it("should pass both range bounds to the counting loop", () => {
      const stmt = forStatement("i", call("range", constant(1), "n"), print("i"));

      expect(statementText("lua", stmt)).to.equal(
        "for i = 1, n - 1 do\n    print(i)\nend"
      );
    });

    it("should iterate values everywhere else", () => {
      const stmt = forStatement("x", "items", print("x"));

      expect(statementText("ruby", stmt)).to.equal(
        "items.each do |x|\n    puts x\nend"
      );
      expect(statementText("php", stmt)).to.equal(
        "foreach ($items as $x) {\n    echo $x, PHP_EOL;\n}"
      );
    });

    it("should emit the placeholder where the target has no value loop", () => {
      const stmt = forStatement("x", "items", print("x"));
      const [code, context] = emitStatement(stmt, contextFor("c", [stmt]));

      expect(code).to.equal(`${PLACEHOLDER_TOKEN};`);
      expect(context.diagnostics.map((d) => d.message)).to.deep.equal([
        "Target 'c' has no rule for for-each loops",
      ]);
    });

    it("should emit while loops", () => {
      const stmt = whileStatement(
        compare("n", [">", constant(0)]),
        augAssign("n", "-", constant(1)),
        breakStatement
      );

      expect(statementText("go", stmt)).to.equal(
        "for n > 0 {\n    n -= 1\n    break\n}"
      );
    });

    it("should spell loop control per target", () => {
      expect(statementText("ruby", continueStatement)).to.equal("next");
      expect(statementText("perl", breakStatement)).to.equal("last;");
      expect(statementText("lua", continueStatement)).to.equal(PLACEHOLDER_TOKEN);
    });

    it("should declare the loop variable in the loop scope only", () => {
      const stmts: readonly AstStatement[] = [
        forStatement("x", "items", assign("x", constant(0))),
        assign("x", constant(1)),
      ];
      let context = contextFor("javascript", stmts);
      const lines: string[] = [];
      for (const stmt of stmts) {
        const [code, next] = emitStatement(stmt, context);
        lines.push(code);
        context = next;
      }

      expect(lines).to.deep.equal([
        "for (let x of items) {\n    x = 0;\n}",
        "let x = 1;",
      ]);
    });
  });

  describe("simple statements", () => {
    it("should keep the return keyword without a value", () => {
      expect(statementText("javascript", returnStatement())).to.equal("return;");
      expect(statementText("python", returnStatement())).to.equal("return");
    });

    it("should record imports and emit nothing", () => {
      const stmt = importStatement("math", "sqrt");
      const [code, context] = emitStatement(stmt, contextFor("java"));

      expect(code).to.equal("");
      expect(context.imports).to.deep.equal([stmt]);
    });

    it("should emit the placeholder for unsupported statements", () => {
      expect(statementText("python", unsupportedStatement("try"))).to.equal(
        PLACEHOLDER_TOKEN
      );
      expect(statementText("csharp", unsupportedStatement("try"))).to.equal(
        `${PLACEHOLDER_TOKEN};`
      );
    });
  });
});
