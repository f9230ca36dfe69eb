/**
 * Expression node converters
 */

import {
  isBinaryOperator,
  isBooleanOperator,
  isComparisonOperator,
  isUnaryOperator,
  NAME_CONSTANTS,
} from "../vocabulary.js";
import type {
  AstDictEntry,
  AstExpression,
  AstUnsupportedExpression,
  NodeLocation,
} from "../types/index.js";
import { isRecord } from "../guards.js";
import {
  convertExpression,
  readExpression,
  readExpressionList,
} from "../expression-converter.js";
import {
  type ConversionContext,
  type RawNode,
  fieldValue,
  readKind,
  readLocation,
  readNodeList,
  readString,
  reportMalformed,
  reportUnsupportedKind,
} from "./fields.js";
import { normalizeOperator } from "./kinds.js";

export const withLocation = <
  T extends { readonly kind: string; readonly location?: NodeLocation },
>(
  node: T,
  location: NodeLocation | undefined
): T => (location ? { ...node, location } : node);

export const unsupportedExpression = (
  sourceKind: string,
  location: NodeLocation | undefined
): AstUnsupportedExpression =>
  withLocation({ kind: "unsupportedExpression", sourceKind }, location);

/**
 * Operators may be plain strings or nodes such as `{ "kind": "Add" }`
 */
const operatorSpelling = (value: unknown): string => {
  if (typeof value === "string") {
    return normalizeOperator(value);
  }
  if (isRecord(value)) {
    const kind = readKind(value);
    return kind === undefined ? "" : normalizeOperator(kind);
  }
  return "";
};

const readOperator = (raw: RawNode): string => operatorSpelling(raw["op"]);

const readOperatorList = (raw: RawNode): readonly string[] => {
  const value: unknown = raw["ops"];
  if (!Array.isArray(value)) {
    return [];
  }
  const items: readonly unknown[] = value;
  return items.map(operatorSpelling);
};

/**
 * An operator outside the model is a node shape the model cannot carry,
 * not a broken tree.
 */
const unknownOperator = (
  raw: RawNode,
  kind: string,
  operator: string,
  context: ConversionContext
): AstUnsupportedExpression => {
  if (operator === "") {
    reportMalformed(context, raw, kind, "is missing 'op'");
  } else {
    reportUnsupportedKind(context, raw, `${kind} ${operator}`);
  }
  return unsupportedExpression(
    operator === "" ? kind : `${kind} ${operator}`,
    readLocation(raw)
  );
};

export const convertConstant = (
  raw: RawNode,
  context: ConversionContext
): AstExpression => {
  const location = readLocation(raw);
  if (!("value" in raw)) {
    reportMalformed(context, raw, "constant", "is missing 'value'");
    return unsupportedExpression("constant", location);
  }

  const value = raw["value"];
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value === null
  ) {
    return withLocation({ kind: "constant", value }, location);
  }

  // Bytes, complex numbers, ellipsis
  reportUnsupportedKind(context, raw, "constant");
  return unsupportedExpression("constant", location);
};

export const convertName = (
  raw: RawNode,
  context: ConversionContext
): AstExpression => {
  const location = readLocation(raw);
  const id = readString(context, raw, "name", ["id"]);
  const constant = NAME_CONSTANTS.get(id);
  if (constant !== undefined) {
    return withLocation({ kind: "constant", value: constant }, location);
  }
  return withLocation({ kind: "name", id }, location);
};

export const convertCall = (
  raw: RawNode,
  context: ConversionContext
): AstExpression =>
  withLocation(
    {
      kind: "call",
      func: readExpression(context, raw, "call", ["func"]),
      args: readExpressionList(context, raw, "call", ["args"]),
    },
    readLocation(raw)
  );

export const convertBinOp = (
  raw: RawNode,
  context: ConversionContext
): AstExpression => {
  const op = readOperator(raw);
  if (!isBinaryOperator(op)) {
    return unknownOperator(raw, "binOp", op, context);
  }
  return withLocation(
    {
      kind: "binOp",
      left: readExpression(context, raw, "binOp", ["left"]),
      op,
      right: readExpression(context, raw, "binOp", ["right"]),
    },
    readLocation(raw)
  );
};

export const convertCompare = (
  raw: RawNode,
  context: ConversionContext
): AstExpression => {
  const location = readLocation(raw);
  const ops = readOperatorList(raw);
  const comparators = readExpressionList(context, raw, "compare", [
    "comparators",
  ]);

  if (ops.length === 0 || ops.length !== comparators.length) {
    reportMalformed(
      context,
      raw,
      "compare",
      "needs one comparator per operator"
    );
    return unsupportedExpression("compare", location);
  }

  const unknown = ops.find((op) => !isComparisonOperator(op));
  if (unknown !== undefined) {
    return unknownOperator(raw, "compare", unknown, context);
  }

  return withLocation(
    {
      kind: "compare",
      left: readExpression(context, raw, "compare", ["left"]),
      ops: ops.filter(isComparisonOperator),
      comparators,
    },
    location
  );
};

export const convertAttribute = (
  raw: RawNode,
  context: ConversionContext
): AstExpression =>
  withLocation(
    {
      kind: "attribute",
      value: readExpression(context, raw, "attribute", ["value"]),
      attr: readString(context, raw, "attribute", ["attr"]),
    },
    readLocation(raw)
  );

export const convertSubscript = (
  raw: RawNode,
  context: ConversionContext
): AstExpression =>
  withLocation(
    {
      kind: "subscript",
      value: readExpression(context, raw, "subscript", ["value"]),
      index: readExpression(context, raw, "subscript", ["index", "slice"]),
    },
    readLocation(raw)
  );

export const convertList = (
  raw: RawNode,
  context: ConversionContext
): AstExpression =>
  withLocation(
    {
      kind: "list",
      items: readExpressionList(context, raw, "list", ["items", "elts"]),
    },
    readLocation(raw)
  );

export const convertTuple = (
  raw: RawNode,
  context: ConversionContext
): AstExpression =>
  withLocation(
    {
      kind: "tuple",
      items: readExpressionList(context, raw, "tuple", ["items", "elts"]),
    },
    readLocation(raw)
  );

/**
 * Dict entries come as `{ key, value }` objects, `[key, value]` pairs, or
 * parallel `keys` / `values` lists.
 */
export const convertDict = (
  raw: RawNode,
  context: ConversionContext
): AstExpression => {
  const location = readLocation(raw);
  const entries: AstDictEntry[] = [];
  const listed = fieldValue(raw, ["entries", "pairs"]);

  if (Array.isArray(listed)) {
    const items: readonly unknown[] = listed;
    for (const entry of items) {
      if (Array.isArray(entry) && entry.length === 2) {
        const pair: readonly unknown[] = entry;
        const [key, value] = pair;
        if (isRecord(key) && isRecord(value)) {
          entries.push({
            key: convertExpression(key, context),
            value: convertExpression(value, context),
          });
          continue;
        }
      } else if (isRecord(entry)) {
        const key = entry["key"];
        if (isRecord(key)) {
          entries.push({
            key: convertExpression(key, context),
            value: readExpression(context, entry, "dict", ["value"]),
          });
          continue;
        }
      }
      reportMalformed(context, raw, "dict", "has an invalid entry");
    }
  } else {
    const keys = readNodeList(context, raw, "dict", ["keys"]);
    const values = readNodeList(context, raw, "dict", ["values"]);
    if (keys.length !== values.length) {
      reportMalformed(context, raw, "dict", "needs one value per key");
      return unsupportedExpression("dict", location);
    }
    keys.forEach((key, index) => {
      const value = values[index];
      if (value !== undefined) {
        entries.push({
          key: convertExpression(key, context),
          value: convertExpression(value, context),
        });
      }
    });
  }

  return withLocation({ kind: "dict", entries }, location);
};

export const convertUnaryOp = (
  raw: RawNode,
  context: ConversionContext
): AstExpression => {
  const op = readOperator(raw);
  if (!isUnaryOperator(op)) {
    return unknownOperator(raw, "unaryOp", op, context);
  }
  return withLocation(
    {
      kind: "unaryOp",
      op,
      operand: readExpression(context, raw, "unaryOp", ["operand"]),
    },
    readLocation(raw)
  );
};

export const convertBoolOp = (
  raw: RawNode,
  context: ConversionContext
): AstExpression => {
  const location = readLocation(raw);
  const op = readOperator(raw);
  if (!isBooleanOperator(op)) {
    return unknownOperator(raw, "boolOp", op, context);
  }

  const values = readExpressionList(context, raw, "boolOp", ["values"]);
  if (values.length < 2) {
    reportMalformed(context, raw, "boolOp", "needs at least two values");
    return unsupportedExpression("boolOp", location);
  }

  return withLocation({ kind: "boolOp", op, values }, location);
};

export const convertConditional = (
  raw: RawNode,
  context: ConversionContext
): AstExpression =>
  withLocation(
    {
      kind: "conditional",
      test: readExpression(context, raw, "conditional", ["test"]),
      body: readExpression(context, raw, "conditional", ["body"]),
      orelse: readExpression(context, raw, "conditional", ["orelse"]),
    },
    readLocation(raw)
  );
