/**
 * Statement Emitter - syntax tree statements to target text
 * Main dispatcher - delegates to specialized modules
 */

import type { AstStatement } from "@retarget/frontend";
import type { EmitterContext } from "./types.js";
import { emitUnsupportedStatement } from "./core/unsupported.js";

import {
  emitReturn,
  emitExpressionStatement,
  emitPass,
  emitBreak,
  emitContinue,
  emitImport,
} from "./statements/blocks.js";
import { emitFunctionDeclaration } from "./statements/declarations/functions.js";
import { emitClassDeclaration } from "./statements/declarations/classes.js";
import {
  emitAssignment,
  emitAugmentedAssignment,
} from "./statements/declarations/variables.js";
import { emitIf } from "./statements/control/conditionals.js";
import { emitFor, emitWhile } from "./statements/control/loops.js";

/**
 * Emit a statement at the context's indentation.
 *
 * Returns an empty string for statements that produce no output (imports).
 */
export const emitStatement = (
  stmt: AstStatement,
  context: EmitterContext
): [string, EmitterContext] => {
  switch (stmt.kind) {
    case "functionDef":
      return emitFunctionDeclaration(stmt, context);

    case "classDef":
      return emitClassDeclaration(stmt, context);

    case "assign":
      return emitAssignment(stmt, context);

    case "augAssign":
      return emitAugmentedAssignment(stmt, context);

    case "if":
      return emitIf(stmt, context);

    case "for":
      return emitFor(stmt, context);

    case "while":
      return emitWhile(stmt, context);

    case "return":
      return emitReturn(stmt, context);

    case "expressionStatement":
      return emitExpressionStatement(stmt, context);

    case "pass":
      return emitPass(stmt, context);

    case "break":
      return emitBreak(stmt, context);

    case "continue":
      return emitContinue(stmt, context);

    case "import":
      return emitImport(stmt, context);

    case "unsupportedStatement":
      return emitUnsupportedStatement(
        context,
        `statement '${stmt.sourceKind}'`,
        stmt.location
      );
  }
};
