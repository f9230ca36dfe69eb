/**
 * Expression converter - serialized parser nodes to AstExpression
 * Main dispatcher - delegates to specialized modules
 */

import type { AstExpression } from "./types/index.js";
import {
  type ConversionContext,
  type RawNode,
  fieldValue,
  readKind,
  readLocation,
  readNodeList,
  reportMalformed,
  reportUnsupportedKind,
} from "./converters/fields.js";
import { normalizeKind } from "./converters/kinds.js";
import { isRecord } from "./guards.js";
import {
  convertAttribute,
  convertBinOp,
  convertBoolOp,
  convertCall,
  convertCompare,
  convertConditional,
  convertConstant,
  convertDict,
  convertList,
  convertName,
  convertSubscript,
  convertTuple,
  convertUnaryOp,
  unsupportedExpression,
} from "./converters/expressions.js";

/**
 * Main expression converter dispatcher
 */
export const convertExpression = (
  raw: RawNode,
  context: ConversionContext
): AstExpression => {
  const kind = readKind(raw);
  if (kind === undefined) {
    reportMalformed(context, raw, "expression", "has no kind");
    return unsupportedExpression("expression", readLocation(raw));
  }

  const normalized = normalizeKind(kind);
  switch (normalized) {
    case "constant":
      return convertConstant(raw, context);
    case "name":
      return convertName(raw, context);
    case "call":
      return convertCall(raw, context);
    case "binOp":
      return convertBinOp(raw, context);
    case "compare":
      return convertCompare(raw, context);
    case "attribute":
      return convertAttribute(raw, context);
    case "subscript":
      return convertSubscript(raw, context);
    case "list":
      return convertList(raw, context);
    case "dict":
      return convertDict(raw, context);
    case "tuple":
      return convertTuple(raw, context);
    case "unaryOp":
      return convertUnaryOp(raw, context);
    case "boolOp":
      return convertBoolOp(raw, context);
    case "conditional":
      return convertConditional(raw, context);
    case "unsupportedExpression": {
      const sourceKind = raw["sourceKind"];
      const name = typeof sourceKind === "string" ? sourceKind : kind;
      reportUnsupportedKind(context, raw, name);
      return unsupportedExpression(name, readLocation(raw));
    }
    default:
      reportUnsupportedKind(context, raw, kind);
      return unsupportedExpression(kind, readLocation(raw));
  }
};

/**
 * Read a required child expression
 */
export const readExpression = (
  context: ConversionContext,
  raw: RawNode,
  kind: string,
  names: readonly string[]
): AstExpression => {
  const value = fieldValue(raw, names);
  if (isRecord(value)) {
    return convertExpression(value, context);
  }
  reportMalformed(context, raw, kind, `is missing '${names[0] ?? "?"}'`);
  return unsupportedExpression(kind, readLocation(raw));
};

/**
 * Read an optional child expression; absent and null both mean "none"
 */
export const readOptionalExpression = (
  context: ConversionContext,
  raw: RawNode,
  kind: string,
  names: readonly string[]
): AstExpression | undefined => {
  const value = fieldValue(raw, names);
  if (value === undefined || value === null) {
    return undefined;
  }
  if (isRecord(value)) {
    return convertExpression(value, context);
  }
  reportMalformed(context, raw, kind, `has an invalid '${names[0] ?? "?"}'`);
  return unsupportedExpression(kind, readLocation(raw));
};

export const readExpressionList = (
  context: ConversionContext,
  raw: RawNode,
  kind: string,
  names: readonly string[]
): readonly AstExpression[] =>
  readNodeList(context, raw, kind, names).map((item) =>
    convertExpression(item, context)
  );
