/**
 * Tests for emit command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  existsSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CatalogEntry } from "@retarget/emitter";
import { emitCommand, outputStem, resolveTargets } from "./emit.js";
import type { ResolvedConfig } from "../types.js";

const withTempDir = (prefix: string, fn: (dir: string) => void): void => {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  try {
    fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

const configFor = (
  dir: string,
  overrides: Partial<ResolvedConfig> = {}
): ResolvedConfig => ({
  projectRoot: dir,
  targets: [],
  outputDirectory: join(dir, "out"),
  indent: 4,
  entryClassName: undefined,
  header: true,
  strict: false,
  verbose: false,
  quiet: true,
  ...overrides,
});

const targetsFor = (...names: string[]): readonly CatalogEntry[] => {
  const result = resolveTargets(names);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
};

const greeting = {
  kind: "program",
  body: [
    {
      kind: "expressionStatement",
      expression: {
        kind: "call",
        func: { kind: "name", id: "print" },
        args: [{ kind: "constant", value: "Ada" }],
      },
    },
  ],
};

const writeTree = (dir: string, file: string, document: unknown): string => {
  const path = join(dir, file);
  writeFileSync(path, JSON.stringify(document));
  return path;
};

const HEADER_TAIL = "WARNING: Do not modify this file manually\n";

describe("Emit Command", () => {
  describe("resolveTargets", () => {
    it("should resolve aliases and drop duplicates", () => {
      expect(targetsFor("js", "JavaScript", "py").map((e) => e.id)).to.deep.equal([
        "javascript",
        "python",
      ]);
    });

    it("should fail on the first unknown target", () => {
      const result = resolveTargets(["go", "cobol"]);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("RTG3001");
      }
    });
  });

  describe("outputStem", () => {
    it("should strip tree and json extensions", () => {
      expect(outputStem("/work/hello.tree.json")).to.equal("hello");
      expect(outputStem("greet.json")).to.equal("greet");
      expect(outputStem("plain")).to.equal("plain");
    });
  });

  describe("emitCommand", () => {
    it("should write one file per target with a header", () => {
      withTempDir("retarget-emit-", (dir) => {
        const tree = writeTree(dir, "hello.tree.json", greeting);
        const config = configFor(dir);

        const result = emitCommand([tree], targetsFor("js", "py"), config);

        expect(result.ok).to.equal(true);
        if (!result.ok) return;
        expect(result.value.filesWritten).to.deep.equal([
          join(dir, "out", "hello.js"),
          join(dir, "out", "hello.py"),
        ]);
        expect(result.value.warnings).to.deep.equal([]);
        expect(readFileSync(join(dir, "out", "hello.js"), "utf-8")).to.equal(
          `// Generated from: hello.tree.json\n// Target: JavaScript\n// ${HEADER_TAIL}console.log("Ada");\n`
        );
        expect(readFileSync(join(dir, "out", "hello.py"), "utf-8")).to.equal(
          `# Generated from: hello.tree.json\n# Target: Python\n# ${HEADER_TAIL}print("Ada")\n`
        );
      });
    });

    it("should omit the header when disabled", () => {
      withTempDir("retarget-emit-noheader-", (dir) => {
        const tree = writeTree(dir, "hello.tree.json", greeting);

        const result = emitCommand(
          [tree],
          targetsFor("ruby"),
          configFor(dir, { header: false })
        );

        expect(result.ok).to.equal(true);
        expect(readFileSync(join(dir, "out", "hello.rb"), "utf-8")).to.equal(
          'puts "Ada"\n'
        );
      });
    });

    it("should keep the PHP open tag above the header", () => {
      withTempDir("retarget-emit-php-", (dir) => {
        const tree = writeTree(dir, "hello.tree.json", greeting);

        emitCommand([tree], targetsFor("php"), configFor(dir));

        expect(readFileSync(join(dir, "out", "hello.php"), "utf-8")).to.equal(
          `<?php\n// Generated from: hello.tree.json\n// Target: PHP\n// ${HEADER_TAIL}echo "Ada", PHP_EOL;\n?>\n`
        );
      });
    });

    it("should write the source verbatim when the tree is unavailable", () => {
      withTempDir("retarget-emit-verbatim-", (dir) => {
        const tree = writeTree(dir, "broken.tree.json", {
          source: "def broken(:\n",
          error: "invalid syntax (line 1)",
        });

        const result = emitCommand([tree], targetsFor("js"), configFor(dir));

        expect(result.ok).to.equal(true);
        if (!result.ok) return;
        expect(readFileSync(join(dir, "out", "broken.js"), "utf-8")).to.equal(
          "def broken(:\n"
        );
        expect(result.value.warnings.map((w) => w.code)).to.deep.equal(["RTG1001"]);
        expect(result.value.warnings[0]?.severity).to.equal("warning");
      });
    });

    it("should fail when the tree is unavailable without source", () => {
      withTempDir("retarget-emit-nosource-", (dir) => {
        const tree = writeTree(dir, "empty.tree.json", { error: "no parser" });

        const result = emitCommand([tree], targetsFor("js"), configFor(dir));

        expect(result.ok).to.equal(false);
        if (result.ok) return;
        expect(result.error).to.include("RTG1001");
        expect(existsSync(join(dir, "out", "empty.js"))).to.equal(false);
      });
    });

    it("should fail on a missing tree file", () => {
      withTempDir("retarget-emit-missing-", (dir) => {
        const missing = join(dir, "missing.tree.json");

        const result = emitCommand([missing], targetsFor("js"), configFor(dir));

        expect(result).to.deep.equal({
          ok: false,
          error: `Tree file not found: ${missing}`,
        });
      });
    });

    it("should collect loader and placeholder warnings with file names", () => {
      withTempDir("retarget-emit-warn-", (dir) => {
        const tree = writeTree(dir, "try.tree.json", {
          kind: "program",
          body: [{ kind: "Try", location: { line: 3, column: 1 } }],
        });

        const result = emitCommand([tree], targetsFor("js"), configFor(dir));

        expect(result.ok).to.equal(true);
        if (!result.ok) return;
        expect(result.value.warnings.map((w) => w.code)).to.deep.equal([
          "RTG2001",
          "RTG2002",
        ]);
        expect(result.value.warnings[1]?.location).to.deep.equal({
          file: join(dir, "out", "try.js"),
          line: 3,
          column: 1,
        });
        expect(readFileSync(join(dir, "out", "try.js"), "utf-8")).to.equal(
          `// Generated from: try.tree.json\n// Target: JavaScript\n// ${HEADER_TAIL}__UNSUPPORTED__;\n`
        );
      });
    });

    it("should apply indent and entry class options", () => {
      withTempDir("retarget-emit-options-", (dir) => {
        const tree = writeTree(dir, "hello.tree.json", greeting);

        emitCommand(
          [tree],
          targetsFor("java"),
          configFor(dir, { header: false, indent: 2, entryClassName: "Hello" })
        );

        expect(readFileSync(join(dir, "out", "hello.java"), "utf-8")).to.equal(
          'public class Hello {\n  public static void main(String[] args) {\n    System.out.println("Ada");\n  }\n}\n'
        );
      });
    });
  });
});
