/**
 * Call expression emitters
 */

import {
  isBuiltinName,
  SELF_NAME,
  type AstCall,
  type AstExpression,
  type BuiltinName,
  type NodeLocation,
} from "@retarget/frontend";
import { emitExpression } from "../expression-emitter.js";
import { renderTemplate, type TemplateSlots } from "../core/template.js";
import { emitUnsupportedExpression } from "../core/unsupported.js";
import {
  markBuiltin,
  type CodeFragment,
  type EmitterContext,
} from "../types.js";
import { atom, PRECEDENCE, wrapBelow } from "./parentheses.js";

/**
 * Emit each expression in order, threading the context
 */
export const emitExpressionList = (
  exprs: readonly AstExpression[],
  context: EmitterContext
): [readonly CodeFragment[], EmitterContext] =>
  exprs.reduce<[readonly CodeFragment[], EmitterContext]>(
    ([fragments, ctx], expr) => {
      const [fragment, next] = emitExpression(expr, ctx);
      return [[...fragments, fragment], next];
    },
    [[], context]
  );

const joinArguments = (args: readonly CodeFragment[]): string =>
  args.map((arg) => arg.text).join(", ");

/**
 * The builtin a callee names, if any. User functions of the same name
 * shadow the builtin.
 */
export const builtinCallName = (
  func: AstExpression,
  context: EmitterContext
): BuiltinName | undefined =>
  func.kind === "name" &&
  isBuiltinName(func.id) &&
  !context.functionNames.has(func.id)
    ? func.id
    : undefined;

/**
 * Rewrite a builtin call through the profile's rule for it.
 *
 * `byArity` beats `pattern`. Arguments joined by a separator that is not a
 * comma (`" + \" \" + "`, `" << \" \" << "`) are parenthesized unless they
 * bind at least as tightly as a unary operator.
 */
export const emitBuiltinCall = (
  name: BuiltinName,
  args: readonly AstExpression[],
  context: EmitterContext,
  location?: NodeLocation
): [CodeFragment, EmitterContext] => {
  const rule = context.profile.builtins[name];
  const template = rule.byArity[args.length] ?? rule.pattern;
  if (template === null) {
    return emitUnsupportedExpression(
      context,
      `builtin '${name}' with ${args.length} argument(s)`,
      location
    );
  }

  const [fragments, argsContext] = emitExpressionList(args, context);
  const separated = rule.separator.trim().startsWith(",")
    ? fragments
    : fragments.map((fragment) => wrapBelow(fragment, PRECEDENCE.unary));

  const slots: Record<string, CodeFragment | string> = {
    args: separated.map((fragment) => fragment.text).join(rule.separator),
    holes: fragments.map(() => rule.hole).join(" "),
  };
  fragments.forEach((fragment, index) => {
    slots[String(index)] = fragment;
  });

  return [renderTemplate(template, slots), markBuiltin(argsContext, name)];
};

const emitCallee = (
  func: AstExpression,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  if (func.kind === "name") {
    // Callees are function names, never sigil-prefixed variables
    return [atom(func.id), context];
  }

  if (func.kind === "attribute") {
    const { expressions } = context.profile;
    if (func.value.kind === "name" && func.value.id === SELF_NAME) {
      return [
        renderTemplate(expressions.selfMethod, { attr: func.attr }),
        context,
      ];
    }
    const [receiver, receiverContext] = emitExpression(func.value, context);
    const slots: TemplateSlots = { value: receiver, attr: func.attr };
    return [renderTemplate(expressions.method, slots), receiverContext];
  }

  const [callee, calleeContext] = emitExpression(func, context);
  return [wrapBelow(callee, PRECEDENCE.atom), calleeContext];
};

/**
 * Emit a call expression
 */
export const emitCall = (
  expr: AstCall,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const builtin = builtinCallName(expr.func, context);
  if (builtin !== undefined) {
    return emitBuiltinCall(builtin, expr.args, context, expr.location);
  }

  if (expr.func.kind === "name" && context.classNames.has(expr.func.id)) {
    const [args, argsContext] = emitExpressionList(expr.args, context);
    return [
      renderTemplate(context.profile.expressions.construct, {
        class: expr.func.id,
        args: joinArguments(args),
      }),
      argsContext,
    ];
  }

  const [callee, calleeContext] = emitCallee(expr.func, context);
  const [args, argsContext] = emitExpressionList(expr.args, calleeContext);
  return [
    atom(`${wrapBelow(callee, PRECEDENCE.atom).text}(${joinArguments(args)})`),
    argsContext,
  ];
};
