/**
 * Conditional statement emission
 */

import type { AstIf, AstStatement } from "@retarget/frontend";
import type { EmitterContext } from "../../types.js";
import { emitExpression } from "../../expression-emitter.js";
import { renderStatement } from "../../core/template.js";
import { emitClauses, type BlockSpec } from "../blocks.js";

/**
 * An `else` holding exactly one `if` continues the chain as `else if`
 */
const elifOf = (orelse: readonly AstStatement[]): AstIf | undefined => {
  const [only] = orelse;
  return orelse.length === 1 && only?.kind === "if" ? only : undefined;
};

/**
 * Emit an if statement, flattening elif chains into one clause list
 */
export const emitIf = (
  stmt: AstIf,
  context: EmitterContext
): [string, EmitterContext] => {
  const { control } = context.profile;
  const clauses: BlockSpec[] = [];
  let currentContext = context;
  let branch: AstIf | undefined = stmt;
  let orelse: readonly AstStatement[] = [];

  while (branch !== undefined) {
    const [test, testContext] = emitExpression(branch.test, currentContext);
    currentContext = testContext;
    clauses.push({
      header: renderStatement(clauses.length === 0 ? control.if : control.elseIf, {
        test,
      }),
      body: branch.body,
    });
    orelse = branch.orelse;
    branch = elifOf(orelse);
  }

  if (orelse.length > 0) {
    clauses.push({ header: control.else, body: orelse });
  }

  return emitClauses(clauses, currentContext);
};
