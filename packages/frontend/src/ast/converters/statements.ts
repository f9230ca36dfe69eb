/**
 * Statement node converters
 */

import { isBinaryOperator } from "../vocabulary.js";
import type {
  AstReturn,
  AstStatement,
  AstUnsupportedStatement,
  NodeLocation,
} from "../types/index.js";
import {
  readExpression,
  readExpressionList,
  readOptionalExpression,
} from "../expression-converter.js";
import { readStatementList } from "../statement-converter.js";
import {
  type ConversionContext,
  type RawNode,
  fieldValue,
  readLocation,
  readNameList,
  readString,
  reportMalformed,
  reportUnsupportedKind,
} from "./fields.js";
import { normalizeOperator } from "./kinds.js";
import { isRecord } from "../guards.js";
import { withLocation } from "./expressions.js";

export const unsupportedStatement = (
  sourceKind: string,
  location: NodeLocation | undefined
): AstUnsupportedStatement =>
  withLocation({ kind: "unsupportedStatement", sourceKind }, location);

export const convertFunctionDef = (
  raw: RawNode,
  context: ConversionContext
): AstStatement => {
  const args = raw["args"];
  // Parser dumps nest parameters as `args: { args: [...] }`
  const params = isRecord(args)
    ? readNameList(context, args, "functionDef", ["args"])
    : readNameList(context, raw, "functionDef", ["params", "args"]);

  return withLocation(
    {
      kind: "functionDef",
      name: readString(context, raw, "functionDef", ["name"]),
      params,
      body: readStatementList(context, raw, "functionDef", ["body"]),
    },
    readLocation(raw)
  );
};

export const convertClassDef = (
  raw: RawNode,
  context: ConversionContext
): AstStatement =>
  withLocation(
    {
      kind: "classDef",
      name: readString(context, raw, "classDef", ["name"]),
      bases: readExpressionList(context, raw, "classDef", ["bases"]),
      body: readStatementList(context, raw, "classDef", ["body"]),
    },
    readLocation(raw)
  );

/**
 * Single-target assignment. A parser `targets` list is accepted when it holds
 * exactly one target; chained assignment is outside the model.
 */
export const convertAssign = (
  raw: RawNode,
  context: ConversionContext
): AstStatement => {
  const location = readLocation(raw);
  const targets = raw["targets"];
  if (Array.isArray(targets)) {
    const items: readonly unknown[] = targets;
    const [first] = items;
    if (items.length !== 1 || !isRecord(first)) {
      reportUnsupportedKind(context, raw, "chained assign");
      return unsupportedStatement("assign", location);
    }
    return withLocation(
      {
        kind: "assign",
        target: readExpression(context, { target: first }, "assign", [
          "target",
        ]),
        value: readExpression(context, raw, "assign", ["value"]),
      },
      location
    );
  }

  return withLocation(
    {
      kind: "assign",
      target: readExpression(context, raw, "assign", ["target"]),
      value: readExpression(context, raw, "assign", ["value"]),
    },
    location
  );
};

export const convertAugAssign = (
  raw: RawNode,
  context: ConversionContext
): AstStatement => {
  const location = readLocation(raw);
  const value = raw["op"];
  const rawOp =
    typeof value === "string"
      ? value
      : isRecord(value) && typeof value["kind"] === "string"
        ? value["kind"]
        : "";
  const op = normalizeOperator(rawOp);

  if (!isBinaryOperator(op)) {
    if (op === "") {
      reportMalformed(context, raw, "augAssign", "is missing 'op'");
    } else {
      reportUnsupportedKind(context, raw, `augAssign ${op}`);
    }
    return unsupportedStatement("augAssign", location);
  }

  return withLocation(
    {
      kind: "augAssign",
      target: readExpression(context, raw, "augAssign", ["target"]),
      op,
      value: readExpression(context, raw, "augAssign", ["value"]),
    },
    location
  );
};

export const convertIf = (
  raw: RawNode,
  context: ConversionContext
): AstStatement =>
  withLocation(
    {
      kind: "if",
      test: readExpression(context, raw, "if", ["test"]),
      body: readStatementList(context, raw, "if", ["body"]),
      orelse: readStatementList(context, raw, "if", ["orelse"]),
    },
    readLocation(raw)
  );

export const convertFor = (
  raw: RawNode,
  context: ConversionContext
): AstStatement => {
  const location = readLocation(raw);
  const orelse = fieldValue(raw, ["orelse"]);
  if (Array.isArray(orelse) && orelse.length > 0) {
    reportUnsupportedKind(context, raw, "for-else");
    return unsupportedStatement("for-else", location);
  }

  return withLocation(
    {
      kind: "for",
      target: readExpression(context, raw, "for", ["target", "var"]),
      iterable: readExpression(context, raw, "for", ["iterable", "iter"]),
      body: readStatementList(context, raw, "for", ["body"]),
    },
    location
  );
};

export const convertWhile = (
  raw: RawNode,
  context: ConversionContext
): AstStatement => {
  const location = readLocation(raw);
  const orelse = fieldValue(raw, ["orelse"]);
  if (Array.isArray(orelse) && orelse.length > 0) {
    reportUnsupportedKind(context, raw, "while-else");
    return unsupportedStatement("while-else", location);
  }

  return withLocation(
    {
      kind: "while",
      test: readExpression(context, raw, "while", ["test"]),
      body: readStatementList(context, raw, "while", ["body"]),
    },
    location
  );
};

export const convertReturn = (
  raw: RawNode,
  context: ConversionContext
): AstStatement => {
  const value = readOptionalExpression(context, raw, "return", ["value"]);
  const node: AstReturn = value ? { kind: "return", value } : { kind: "return" };
  return withLocation(node, readLocation(raw));
};

export const convertExpressionStatement = (
  raw: RawNode,
  context: ConversionContext
): AstStatement =>
  withLocation(
    {
      kind: "expressionStatement",
      expression: readExpression(context, raw, "expressionStatement", [
        "expression",
        "expr",
        "value",
      ]),
    },
    readLocation(raw)
  );

/**
 * `import a.b` and `from a.b import c, d`
 */
export const convertImport = (
  raw: RawNode,
  context: ConversionContext
): AstStatement => {
  const location = readLocation(raw);
  const module = fieldValue(raw, ["module"]);
  if (typeof module === "string") {
    return withLocation(
      {
        kind: "import",
        module,
        names: readNameList(context, raw, "import", ["names"]),
      },
      location
    );
  }

  // Whole-module form: `names` lists the modules themselves
  const modules = readNameList(context, raw, "import", ["names"]);
  const [first] = modules;
  if (first === undefined) {
    reportMalformed(context, raw, "import", "is missing 'module'");
    return unsupportedStatement("import", location);
  }
  return withLocation(
    { kind: "import", module: modules.join(", "), names: [] },
    location
  );
};
