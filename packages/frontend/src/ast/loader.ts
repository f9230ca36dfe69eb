/**
 * Tree loader - reads the external parser's JSON document into a typed tree.
 *
 * A document is either a bare program node or an envelope:
 *
 * ```json
 * { "source": "print('hi')\n", "program": { "kind": "program", "body": [] } }
 * { "source": "def broken(:\n", "error": "invalid syntax (line 1)" }
 * ```
 *
 * An envelope without a program means the tree could not be produced
 * upstream. The failure carries the source back so callers can fall back to
 * the original text.
 */

import {
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  type Diagnostic,
} from "../types/diagnostic.js";
import { error, ok, type Result } from "../types/result.js";
import type { AstProgram, SyntaxDocument } from "./types/index.js";
import { isRecord } from "./guards.js";
import {
  createConversionContext,
  readKind,
  type RawNode,
} from "./converters/fields.js";
import { normalizeKind } from "./converters/kinds.js";
import { readStatementList } from "./statement-converter.js";

/**
 * Why a tree could not be loaded. `source` is present when the document
 * shipped the original program text.
 */
export type TreeLoadFailure = {
  readonly diagnostics: readonly Diagnostic[];
  readonly source?: string;
};

export type LoadedTree = SyntaxDocument & {
  /** Warnings about node shapes replaced by placeholders */
  readonly diagnostics: readonly Diagnostic[];
};

const failure = (
  diagnostic: Diagnostic,
  source: string | undefined
): Result<LoadedTree, TreeLoadFailure> =>
  error(
    source === undefined
      ? { diagnostics: [diagnostic] }
      : { diagnostics: [diagnostic], source }
  );

const isProgramNode = (raw: RawNode): boolean => {
  const kind = readKind(raw);
  return kind !== undefined && normalizeKind(kind) === "program";
};

/**
 * Convert an already-parsed document value into a typed tree
 */
export const convertDocument = (
  value: unknown,
  file = ""
): Result<LoadedTree, TreeLoadFailure> => {
  if (!isRecord(value)) {
    return failure(
      createDiagnostic(
        "RTG1002",
        "error",
        "Tree document must be a JSON object",
        { file, line: 1, column: 1 }
      ),
      undefined
    );
  }

  const rawSource = value["source"];
  const source = typeof rawSource === "string" ? rawSource : undefined;
  const programValue = isProgramNode(value) ? value : value["program"];

  if (!isRecord(programValue)) {
    const reason = value["error"];
    return failure(
      createDiagnostic(
        "RTG1001",
        "error",
        typeof reason === "string"
          ? `Syntax tree unavailable: ${reason}`
          : "Syntax tree unavailable: document carries no program",
        { file, line: 1, column: 1 },
        source === undefined
          ? undefined
          : "The original source is emitted unchanged"
      ),
      source
    );
  }

  if (!isProgramNode(programValue)) {
    return failure(
      createDiagnostic(
        "RTG1002",
        "error",
        `Tree root must be a program node, found '${readKind(programValue) ?? "nothing"}'`,
        { file, line: 1, column: 1 }
      ),
      source
    );
  }

  const context = createConversionContext(file);
  const program: AstProgram = {
    kind: "program",
    body: readStatementList(context, programValue, "program", ["body"]),
  };

  const collector = context.diagnostics.reduce(
    addDiagnostic,
    createDiagnosticsCollector()
  );
  if (collector.hasErrors) {
    return error(
      source === undefined
        ? { diagnostics: collector.diagnostics }
        : { diagnostics: collector.diagnostics, source }
    );
  }

  return ok(
    source === undefined
      ? { program, diagnostics: collector.diagnostics }
      : { program, source, diagnostics: collector.diagnostics }
  );
};

/**
 * Parse and convert a tree document from its JSON text
 */
export const loadTree = (
  json: string,
  file = ""
): Result<LoadedTree, TreeLoadFailure> => {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (e) {
    return failure(
      createDiagnostic(
        "RTG1002",
        "error",
        `Tree document is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
        { file, line: 1, column: 1 }
      ),
      undefined
    );
  }
  return convertDocument(value, file);
};
