/**
 * retarget emit command - emit syntax trees for each target
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import {
  createDiagnosticsCollector,
  error,
  formatDiagnostic,
  loadTree,
  ok,
  withFile,
  type AstProgram,
  type Diagnostic,
  type Result,
} from "@retarget/frontend";
import {
  checkSyntax,
  emitProgram,
  generateFileHeader,
  PROFILES,
  resolveCatalogEntry,
  type CatalogEntry,
} from "@retarget/emitter";
import type { ResolvedConfig } from "../types.js";

export type EmitSummary = {
  /** Paths of the files written, in emission order */
  readonly filesWritten: readonly string[];
  /** Warnings reported across all files */
  readonly warnings: readonly Diagnostic[];
};

/**
 * Resolve target names or aliases to catalog entries, dropping duplicates
 */
export const resolveTargets = (
  names: readonly string[]
): Result<readonly CatalogEntry[], Diagnostic> => {
  const entries: CatalogEntry[] = [];
  for (const name of names) {
    const resolved = resolveCatalogEntry(name);
    if (!resolved.ok) {
      return resolved;
    }
    if (!entries.includes(resolved.value)) {
      entries.push(resolved.value);
    }
  }
  return ok(entries);
};

/**
 * Output file stem of a tree file: `hello.tree.json` becomes `hello`
 */
export const outputStem = (treeFile: string): string =>
  basename(treeFile)
    .replace(/\.json$/i, "")
    .replace(/\.tree$/i, "");

/**
 * Prepend the header. Targets whose output opens with a script tag keep the
 * tag on the first line.
 */
const withHeader = (code: string, header: string, entry: CatalogEntry): string => {
  const { wrapper } = PROFILES[entry.id];
  if (wrapper.kind === "scriptTag" && wrapper.prologue.startsWith("<?")) {
    const lineEnd = code.indexOf("\n");
    if (lineEnd >= 0) {
      return `${code.slice(0, lineEnd + 1)}${header}${code.slice(lineEnd + 1)}`;
    }
  }
  return `${header}${code}`;
};

type TreeSource =
  | { readonly kind: "tree"; readonly program: AstProgram; readonly diagnostics: readonly Diagnostic[] }
  | { readonly kind: "verbatim"; readonly source: string; readonly diagnostics: readonly Diagnostic[] };

const asWarning = (diagnostic: Diagnostic): Diagnostic => ({
  ...diagnostic,
  severity: "warning",
});

const readTree = (treeFile: string): Result<TreeSource, string> => {
  if (!existsSync(treeFile)) {
    return error(`Tree file not found: ${treeFile}`);
  }

  const loaded = loadTree(readFileSync(treeFile, "utf-8"), treeFile);
  if (loaded.ok) {
    const tree: TreeSource = {
      kind: "tree",
      program: loaded.value.program,
      diagnostics: loaded.value.diagnostics,
    };
    return ok(tree);
  }

  const { source, diagnostics } = loaded.error;
  if (source === undefined) {
    return error(diagnostics.map(formatDiagnostic).join("\n"));
  }
  // Parse unavailable: hand the original text through unchanged
  const verbatim: TreeSource = {
    kind: "verbatim",
    source,
    diagnostics: diagnostics.map(asWarning),
  };
  return ok(verbatim);
};

const emitForTarget = (
  tree: TreeSource,
  entry: CatalogEntry,
  config: ResolvedConfig
): Result<{ readonly code: string; readonly diagnostics: readonly Diagnostic[] }, string> => {
  if (tree.kind === "verbatim") {
    return ok({ code: tree.source, diagnostics: [] });
  }

  const result = emitProgram(tree.program, entry.id, {
    indent: config.indent,
    entryClassName: config.entryClassName,
  });
  if (!result.ok) {
    return error(formatDiagnostic(result.error));
  }

  const syntax = checkSyntax(
    result.value.code,
    PROFILES[entry.id],
    createDiagnosticsCollector()
  );
  return ok({
    code: result.value.code,
    diagnostics: [...result.value.diagnostics, ...syntax.diagnostics],
  });
};

/**
 * Emit every tree file for every target into the output directory
 */
export const emitCommand = (
  treeFiles: readonly string[],
  targets: readonly CatalogEntry[],
  config: ResolvedConfig
): Result<EmitSummary, string> => {
  const filesWritten: string[] = [];
  const warnings: Diagnostic[] = [];

  const report = (diagnostics: readonly Diagnostic[], file: string): void => {
    for (const diagnostic of diagnostics) {
      const located = withFile(diagnostic, file);
      warnings.push(located);
      if (!config.quiet) {
        console.warn(`Warning: ${formatDiagnostic(located)}`);
      }
    }
  };

  try {
    mkdirSync(config.outputDirectory, { recursive: true });

    for (const treeFile of treeFiles) {
      const tree = readTree(treeFile);
      if (!tree.ok) {
        return tree;
      }
      report(tree.value.diagnostics, treeFile);

      const stem = outputStem(treeFile);
      for (const entry of targets) {
        const emitted = emitForTarget(tree.value, entry, config);
        if (!emitted.ok) {
          return emitted;
        }

        const outputPath = join(config.outputDirectory, `${stem}${entry.extension}`);
        report(emitted.value.diagnostics, outputPath);

        const content =
          config.header && tree.value.kind === "tree"
            ? withHeader(
                emitted.value.code,
                generateFileHeader(entry, basename(treeFile)),
                entry
              )
            : emitted.value.code;
        writeFileSync(outputPath, content, "utf-8");
        filesWritten.push(outputPath);

        if (config.verbose) {
          console.log(`  ${entry.name}: ${outputPath}`);
        }
      }
    }
  } catch (e) {
    return error(
      `Failed to write output: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  if (!config.quiet) {
    console.log(
      `✓ Emitted ${filesWritten.length} file(s) to ${config.outputDirectory}`
    );
  }

  return ok({ filesWritten, warnings });
};
