/**
 * Field readers shared by the node converters.
 *
 * Every reader reports a malformed field into the conversion context and
 * returns a stand-in value, so one broken node never hides the problems of
 * its siblings.
 */

import {
  createDiagnostic,
  type Diagnostic,
  type SourceLocation,
} from "../../types/diagnostic.js";
import { isRecord } from "../guards.js";
import type { NodeLocation } from "../types/index.js";

export type RawNode = Readonly<Record<string, unknown>>;

export type ConversionContext = {
  readonly file: string;
  readonly diagnostics: Diagnostic[];
};

export const createConversionContext = (file: string): ConversionContext => ({
  file,
  diagnostics: [],
});

/**
 * Node location as reported by the parser, either as a `location` object or
 * as flat `lineno` / `col_offset` fields.
 */
export const readLocation = (raw: RawNode): NodeLocation | undefined => {
  const location = raw["location"];
  if (
    isRecord(location) &&
    typeof location["line"] === "number" &&
    typeof location["column"] === "number"
  ) {
    return { line: location["line"], column: location["column"] };
  }

  const line = raw["lineno"];
  const column = raw["col_offset"];
  if (typeof line === "number" && typeof column === "number") {
    return { line, column: column + 1 };
  }

  return undefined;
};

export const toSourceLocation = (
  context: ConversionContext,
  location: NodeLocation | undefined
): SourceLocation | undefined =>
  location
    ? { file: context.file, line: location.line, column: location.column }
    : undefined;

export const reportMalformed = (
  context: ConversionContext,
  raw: RawNode,
  kind: string,
  message: string
): void => {
  context.diagnostics.push(
    createDiagnostic(
      "RTG1003",
      "error",
      `Node '${kind}' ${message}`,
      toSourceLocation(context, readLocation(raw)),
      "Regenerate the tree with the parser"
    )
  );
};

export const reportUnsupportedKind = (
  context: ConversionContext,
  raw: RawNode,
  kind: string
): void => {
  context.diagnostics.push(
    createDiagnostic(
      "RTG2001",
      "warning",
      `Node kind '${kind}' is not part of the syntax model`,
      toSourceLocation(context, readLocation(raw)),
      "A placeholder is emitted in its place"
    )
  );
};

/**
 * First present value among a field and its alternative spellings
 */
export const fieldValue = (
  raw: RawNode,
  names: readonly string[]
): unknown => {
  for (const name of names) {
    if (name in raw) {
      return raw[name];
    }
  }
  return undefined;
};

export const readString = (
  context: ConversionContext,
  raw: RawNode,
  kind: string,
  names: readonly string[]
): string => {
  const value = fieldValue(raw, names);
  if (typeof value === "string") {
    return value;
  }
  reportMalformed(context, raw, kind, `is missing '${names[0] ?? "?"}'`);
  return "";
};

/**
 * Parameter-like lists: plain strings, or objects carrying `name` / `arg`
 */
export const readNameList = (
  context: ConversionContext,
  raw: RawNode,
  kind: string,
  names: readonly string[]
): readonly string[] => {
  const value = fieldValue(raw, names);
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    reportMalformed(context, raw, kind, `has a non-list '${names[0] ?? "?"}'`);
    return [];
  }

  const items: readonly unknown[] = value;
  const result: string[] = [];
  for (const item of items) {
    if (typeof item === "string") {
      result.push(item);
    } else if (isRecord(item) && typeof item["name"] === "string") {
      result.push(item["name"]);
    } else if (isRecord(item) && typeof item["arg"] === "string") {
      result.push(item["arg"]);
    } else {
      reportMalformed(
        context,
        raw,
        kind,
        `has an invalid entry in '${names[0] ?? "?"}'`
      );
    }
  }
  return result;
};

/**
 * Node lists; non-object entries are reported and skipped
 */
export const readNodeList = (
  context: ConversionContext,
  raw: RawNode,
  kind: string,
  names: readonly string[]
): readonly RawNode[] => {
  const value = fieldValue(raw, names);
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    reportMalformed(context, raw, kind, `has a non-list '${names[0] ?? "?"}'`);
    return [];
  }

  const items: readonly unknown[] = value;
  const result: RawNode[] = [];
  for (const item of items) {
    if (isRecord(item)) {
      result.push(item);
    } else {
      reportMalformed(
        context,
        raw,
        kind,
        `has a non-node entry in '${names[0] ?? "?"}'`
      );
    }
  }
  return result;
};

/**
 * Node kind. Parser dumps may carry an unrelated `kind: null` attribute next
 * to `_type`, so the first string-valued spelling wins.
 */
export const readKind = (raw: RawNode): string | undefined => {
  for (const name of ["kind", "type", "_type"]) {
    const kind = raw[name];
    if (typeof kind === "string") {
      return kind;
    }
  }
  return undefined;
};
