/**
 * Assignment emission
 */

import type {
  AstAssign,
  AstAugAssign,
  AstExpression,
} from "@retarget/frontend";
import {
  declare,
  isDeclared,
  type EmitterContext,
} from "../../types.js";
import { emitExpression } from "../../expression-emitter.js";
import { renderStatement } from "../../core/template.js";
import { emitUnsupportedStatement } from "../../core/unsupported.js";
import {
  binaryOperatorRule,
  emitBinaryOperation,
  infixToken,
} from "../../expressions/operators.js";
import { simpleStatement } from "../blocks.js";

/**
 * Variable names bound by an assignment target: a name, or a tuple made of
 * names only. Attribute and subscript targets bind nothing.
 */
const boundNames = (target: AstExpression): readonly string[] => {
  if (target.kind === "name") {
    return [target.id];
  }
  if (target.kind === "tuple") {
    const names = target.items.flatMap((item) =>
      item.kind === "name" ? [item.id] : []
    );
    return names.length === target.items.length ? names : [];
  }
  return [];
};

/**
 * Class-level assignment: a static field of the enclosing class
 */
const emitField = (
  stmt: AstAssign,
  name: string,
  className: string,
  context: EmitterContext
): [string, EmitterContext] => {
  const template = context.profile.classes.field;
  if (template === null) {
    return emitUnsupportedStatement(
      context,
      "class-level variables",
      stmt.location
    );
  }

  const [value, newContext] = emitExpression(stmt.value, context);
  return [
    simpleStatement(
      context,
      renderStatement(template, { name, value, class: className })
    ),
    newContext,
  ];
};

/**
 * Declaration of a name not bound yet, initialized to the target's null
 */
const emitPredeclaration = (
  name: string,
  declaration: { readonly keyword: string; readonly template: string },
  context: EmitterContext
): string => {
  const [target] = emitExpression({ kind: "name", id: name }, context);
  const [value] = emitExpression({ kind: "constant", value: null }, context);
  return simpleStatement(
    context,
    renderStatement(declaration.template, {
      keyword: declaration.keyword,
      target,
      value,
    })
  );
};

/**
 * Emit an assignment. The first assignment of a name in a body uses the
 * target's declaration form; later ones assign plainly. A tuple target
 * mixing new and bound names declares the new ones on lines of their own
 * first.
 */
export const emitAssignment = (
  stmt: AstAssign,
  context: EmitterContext
): [string, EmitterContext] => {
  const { className } = context;
  if (className !== undefined && stmt.target.kind === "name") {
    return emitField(stmt, stmt.target.id, className, context);
  }

  const { variables } = context.profile;
  const names = boundNames(stmt.target);
  const fresh = names.filter((name) => !isDeclared(context, name));
  const declaration = variables.declaration;

  const [target, targetContext] = emitExpression(stmt.target, context);
  const [value, valueContext] = emitExpression(stmt.value, targetContext);

  if (declaration !== null && fresh.length > 0 && fresh.length === names.length) {
    const text = renderStatement(declaration.template, {
      keyword: declaration.keyword,
      target,
      value,
    });
    return [simpleStatement(context, text), declare(valueContext, names)];
  }

  const assignment = simpleStatement(
    context,
    renderStatement(variables.assign, { target, value })
  );
  if (declaration === null || fresh.length === 0) {
    return [assignment, declare(valueContext, names)];
  }

  const lines = [
    ...fresh.map((name) => emitPredeclaration(name, declaration, context)),
    assignment,
  ];
  return [lines.join("\n"), declare(valueContext, fresh)];
};

/** Operator tokens a compound assignment can be spelled with */
const SYMBOLIC_TOKEN = /^[^A-Za-z\s]+$/;

/**
 * Emit an augmented assignment. Targets with a compound form use it for
 * symbolic operators; otherwise `x op= y` expands to `x = x op y`. Never
 * declares.
 */
export const emitAugmentedAssignment = (
  stmt: AstAugAssign,
  context: EmitterContext
): [string, EmitterContext] => {
  const { profile } = context;
  const operation = {
    left: stmt.target,
    op: stmt.op,
    right: stmt.value,
  };
  const token = infixToken(binaryOperatorRule(operation, context));
  const compound = profile.statements.augAssign;

  const [target, targetContext] = emitExpression(stmt.target, context);

  if (compound !== null && token !== undefined && SYMBOLIC_TOKEN.test(token)) {
    const [value, valueContext] = emitExpression(stmt.value, targetContext);
    return [
      simpleStatement(
        context,
        renderStatement(compound, { target, op: token, value })
      ),
      valueContext,
    ];
  }

  const [value, valueContext] = emitBinaryOperation(
    { kind: "binOp", ...operation, location: stmt.location },
    targetContext
  );
  return [
    simpleStatement(
      context,
      renderStatement(profile.variables.assign, { target, value })
    ),
    valueContext,
  ];
};
