/**
 * Statement converter - serialized parser nodes to AstStatement
 * Main dispatcher - delegates to specialized modules
 */

import type { AstStatement } from "./types/index.js";
import {
  type ConversionContext,
  type RawNode,
  readKind,
  readLocation,
  readNodeList,
  reportMalformed,
  reportUnsupportedKind,
} from "./converters/fields.js";
import { normalizeKind } from "./converters/kinds.js";
import { isExpressionKind } from "./guards.js";
import { convertExpression } from "./expression-converter.js";
import { withLocation } from "./converters/expressions.js";
import {
  convertAssign,
  convertAugAssign,
  convertClassDef,
  convertExpressionStatement,
  convertFor,
  convertFunctionDef,
  convertIf,
  convertImport,
  convertReturn,
  convertWhile,
  unsupportedStatement,
} from "./converters/statements.js";

/**
 * Main statement converter dispatcher
 */
export const convertStatement = (
  raw: RawNode,
  context: ConversionContext
): AstStatement => {
  const kind = readKind(raw);
  if (kind === undefined) {
    reportMalformed(context, raw, "statement", "has no kind");
    return unsupportedStatement("statement", readLocation(raw));
  }

  const normalized = normalizeKind(kind);
  switch (normalized) {
    case "functionDef":
      return convertFunctionDef(raw, context);
    case "classDef":
      return convertClassDef(raw, context);
    case "assign":
      return convertAssign(raw, context);
    case "augAssign":
      return convertAugAssign(raw, context);
    case "if":
      return convertIf(raw, context);
    case "for":
      return convertFor(raw, context);
    case "while":
      return convertWhile(raw, context);
    case "return":
      return convertReturn(raw, context);
    case "expressionStatement":
      return convertExpressionStatement(raw, context);
    case "pass":
      return withLocation({ kind: "pass" }, readLocation(raw));
    case "break":
      return withLocation({ kind: "break" }, readLocation(raw));
    case "continue":
      return withLocation({ kind: "continue" }, readLocation(raw));
    case "import":
      return convertImport(raw, context);
    case "unsupportedStatement": {
      const sourceKind = raw["sourceKind"];
      const name = typeof sourceKind === "string" ? sourceKind : kind;
      reportUnsupportedKind(context, raw, name);
      return unsupportedStatement(name, readLocation(raw));
    }
    default:
      // A bare expression in statement position
      if (isExpressionKind(normalized)) {
        const expression = convertExpression(raw, context);
        return withLocation(
          { kind: "expressionStatement", expression },
          readLocation(raw)
        );
      }
      reportUnsupportedKind(context, raw, kind);
      return unsupportedStatement(kind, readLocation(raw));
  }
};

export const readStatementList = (
  context: ConversionContext,
  raw: RawNode,
  kind: string,
  names: readonly string[]
): readonly AstStatement[] =>
  readNodeList(context, raw, kind, names).map((item) =>
    convertStatement(item, context)
  );
