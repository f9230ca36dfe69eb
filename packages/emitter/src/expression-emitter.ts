/**
 * Expression Emitter - syntax tree expressions to target text
 * Main dispatcher - delegates to specialized modules
 */

import type { AstExpression } from "@retarget/frontend";
import type { CodeFragment, EmitterContext } from "./types.js";
import { emitUnsupportedExpression } from "./core/unsupported.js";

// Import expression emitters from specialized modules
import { emitConstant } from "./expressions/literals.js";
import { emitName } from "./expressions/identifiers.js";
import { emitCall } from "./expressions/calls.js";
import {
  emitBinaryOperation,
  emitComparison,
  emitUnaryOperation,
  emitBooleanOperation,
  emitConditional,
} from "./expressions/operators.js";
import { emitAttribute, emitSubscript } from "./expressions/access.js";
import { emitList, emitTuple, emitDict } from "./expressions/collections.js";

/**
 * Emit an expression as a target code fragment.
 *
 * Never throws: shapes the profile cannot express become the placeholder
 * token plus an RTG2002 diagnostic in the returned context.
 */
export const emitExpression = (
  expr: AstExpression,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  switch (expr.kind) {
    case "constant":
      return emitConstant(expr, context);

    case "name":
      return emitName(expr, context);

    case "call":
      return emitCall(expr, context);

    case "binOp":
      return emitBinaryOperation(expr, context);

    case "compare":
      return emitComparison(expr, context);

    case "unaryOp":
      return emitUnaryOperation(expr, context);

    case "boolOp":
      return emitBooleanOperation(expr, context);

    case "conditional":
      return emitConditional(expr, context);

    case "attribute":
      return emitAttribute(expr, context);

    case "subscript":
      return emitSubscript(expr, context);

    case "list":
      return emitList(expr, context);

    case "tuple":
      return emitTuple(expr, context);

    case "dict":
      return emitDict(expr, context);

    case "unsupportedExpression":
      return emitUnsupportedExpression(
        context,
        `expression '${expr.sourceKind}'`,
        expr.location
      );
  }
};
