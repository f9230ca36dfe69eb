/**
 * Loop statement emission
 */

import type {
  AstExpression,
  AstFor,
  AstWhile,
} from "@retarget/frontend";
import {
  markBuiltin,
  pushScope,
  type CodeFragment,
  type EmitterContext,
} from "../../types.js";
import { emitExpression } from "../../expression-emitter.js";
import { renderStatement } from "../../core/template.js";
import { emitUnsupportedStatement } from "../../core/unsupported.js";
import { builtinCallName } from "../../expressions/calls.js";
import { atom } from "../../expressions/parentheses.js";
import { emitBlock } from "../blocks.js";

type RangeBounds = {
  readonly start: AstExpression | undefined;
  readonly stop: AstExpression;
};

/**
 * `range(stop)` or `range(start, stop)` in iterable position
 */
const rangeBounds = (
  iterable: AstExpression,
  context: EmitterContext
): RangeBounds | undefined => {
  if (
    iterable.kind !== "call" ||
    builtinCallName(iterable.func, context) !== "range"
  ) {
    return undefined;
  }
  const [first, second] = iterable.args;
  if (iterable.args.length === 1 && first !== undefined) {
    return { start: undefined, stop: first };
  }
  if (iterable.args.length === 2 && first !== undefined && second !== undefined) {
    return { start: first, stop: second };
  }
  return undefined;
};

const loopVariables = (target: AstExpression): readonly string[] =>
  target.kind === "name"
    ? [target.id]
    : target.kind === "tuple"
      ? target.items.flatMap((item) => (item.kind === "name" ? [item.id] : []))
      : [];

const emitRangeHeader = (
  template: string,
  variable: string,
  bounds: RangeBounds,
  context: EmitterContext
): [string, EmitterContext] => {
  const [start, startContext]: [CodeFragment, EmitterContext] =
    bounds.start === undefined
      ? [atom("0"), context]
      : emitExpression(bounds.start, context);
  const [stop, stopContext] = emitExpression(bounds.stop, startContext);
  return [
    renderStatement(template, { var: variable, start, stop }),
    markBuiltin(stopContext, "range"),
  ];
};

/**
 * Emit a for loop. Loops over `range` use the target's counting loop when it
 * has one; everything else iterates the emitted iterable.
 */
export const emitFor = (
  stmt: AstFor,
  context: EmitterContext
): [string, EmitterContext] => {
  const { control } = context.profile;
  const [target, targetContext] = emitExpression(stmt.target, context);
  const bounds = rangeBounds(stmt.iterable, context);

  let header: string;
  let headerContext: EmitterContext;
  if (bounds !== undefined && control.forRange !== null) {
    [header, headerContext] = emitRangeHeader(
      control.forRange,
      target.text,
      bounds,
      targetContext
    );
  } else if (control.forEach !== null) {
    const [iterable, iterableContext] = emitExpression(
      stmt.iterable,
      targetContext
    );
    header = renderStatement(control.forEach, {
      var: target.text,
      iterable,
    });
    headerContext = iterableContext;
  } else {
    return emitUnsupportedStatement(context, "for-each loops", stmt.location);
  }

  return emitBlock(
    {
      header,
      body: stmt.body,
      scope: {
        scopes: pushScope(headerContext, loopVariables(stmt.target)),
        className: headerContext.className,
      },
    },
    headerContext
  );
};

export const emitWhile = (
  stmt: AstWhile,
  context: EmitterContext
): [string, EmitterContext] => {
  const [test, testContext] = emitExpression(stmt.test, context);
  return emitBlock(
    {
      header: renderStatement(context.profile.control.while, { test }),
      body: stmt.body,
    },
    testContext
  );
};
