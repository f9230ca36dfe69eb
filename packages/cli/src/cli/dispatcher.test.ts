/**
 * Tests for CLI dispatch and exit codes
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
import { runCli } from "./dispatcher.js";

const withProject = async (
  fn: (dir: string) => Promise<void>
): Promise<void> => {
  const dir = mkdtempSync(join(tmpdir(), "retarget-cli-"));
  try {
    await fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

const assignTree = JSON.stringify({
  kind: "program",
  body: [
    {
      kind: "assign",
      target: { kind: "name", id: "x" },
      value: { kind: "constant", value: 1 },
    },
  ],
});

describe("CLI Dispatcher", () => {
  it("should exit 0 for version and help", async () => {
    expect(await runCli(["--version"])).to.equal(0);
    expect(await runCli([])).to.equal(0);
  });

  it("should exit 2 for an unknown command", async () => {
    expect(await runCli(["compile"])).to.equal(2);
  });

  it("should exit 2 for usage errors", async () => {
    await withProject(async (dir) => {
      expect(await runCli(["emit", "-q", "-t", "js"], dir)).to.equal(2);
      expect(await runCli(["emit", "-q", "a.tree.json"], dir)).to.equal(2);
      expect(await runCli(["emit", "--indent", "0"], dir)).to.equal(2);
    });
  });

  it("should exit 3 for an unknown target", async () => {
    await withProject(async (dir) => {
      writeFileSync(join(dir, "a.tree.json"), assignTree);

      expect(await runCli(["emit", "a.tree.json", "-q", "-t", "cobol"], dir)).to.equal(3);
    });
  });

  it("should exit 3 for an invalid retarget.json", async () => {
    await withProject(async (dir) => {
      writeFileSync(join(dir, "retarget.json"), JSON.stringify({ indent: "x" }));
      writeFileSync(join(dir, "a.tree.json"), assignTree);

      expect(await runCli(["emit", "a.tree.json", "-q", "-t", "js"], dir)).to.equal(3);
    });
  });

  it("should emit with targets and output directory from retarget.json", async () => {
    await withProject(async (dir) => {
      writeFileSync(
        join(dir, "retarget.json"),
        JSON.stringify({ targets: ["lua"], outputDirectory: "gen", header: false })
      );
      writeFileSync(join(dir, "a.tree.json"), assignTree);

      expect(await runCli(["emit", "a.tree.json", "-q"], dir)).to.equal(0);
      expect(readFileSync(join(dir, "gen", "a.lua"), "utf-8")).to.equal(
        "local x = 1\n"
      );
    });
  });

  it("should resolve -o against the working directory", async () => {
    await withProject(async (dir) => {
      writeFileSync(join(dir, "a.tree.json"), assignTree);

      expect(
        await runCli(["emit", "a.tree.json", "-q", "-t", "py", "-o", "build"], dir)
      ).to.equal(0);
      expect(existsSync(join(dir, "build", "a.py"))).to.equal(true);
    });
  });

  it("should exit 1 in strict mode when warnings were reported", async () => {
    await withProject(async (dir) => {
      writeFileSync(
        join(dir, "a.tree.json"),
        JSON.stringify({ kind: "program", body: [{ kind: "Try" }] })
      );

      expect(await runCli(["emit", "a.tree.json", "-q", "-t", "js"], dir)).to.equal(0);
      expect(
        await runCli(["emit", "a.tree.json", "-q", "-t", "js", "--strict"], dir)
      ).to.equal(1);
      expect(existsSync(join(dir, "retargeted", "a.js"))).to.equal(true);
    });
  });

  it("should exit 1 when a tree file is missing", async () => {
    await withProject(async (dir) => {
      expect(await runCli(["emit", "none.tree.json", "-q", "-t", "js"], dir)).to.equal(1);
    });
  });
});
