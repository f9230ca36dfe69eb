/**
 * Member access and indexing emitters
 */

import { SELF_NAME, type AstAttribute, type AstSubscript } from "@retarget/frontend";
import { emitExpression } from "../expression-emitter.js";
import { renderTemplate } from "../core/template.js";
import type { CodeFragment, EmitterContext } from "../types.js";

/**
 * Emit an attribute read. Attributes of the receiver use the target's
 * self-qualification (`this.x`, `$this->x`, `@x`, `$self->{x}`).
 */
export const emitAttribute = (
  expr: AstAttribute,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const { expressions } = context.profile;
  if (expr.value.kind === "name" && expr.value.id === SELF_NAME) {
    return [
      renderTemplate(expressions.selfAttribute, { attr: expr.attr }),
      context,
    ];
  }

  const [value, valueContext] = emitExpression(expr.value, context);
  return [
    renderTemplate(expressions.attribute, { value, attr: expr.attr }),
    valueContext,
  ];
};

export const emitSubscript = (
  expr: AstSubscript,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const [value, valueContext] = emitExpression(expr.value, context);
  const [index, indexContext] = emitExpression(expr.index, valueContext);
  return [
    renderTemplate(context.profile.expressions.subscript, { value, index }),
    indexContext,
  ];
};
