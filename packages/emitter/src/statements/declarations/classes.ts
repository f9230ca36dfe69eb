/**
 * Class declaration emission
 */

import type { AstClassDef, AstExpression } from "@retarget/frontend";
import { getIndent, withScoped, type EmitterContext } from "../../types.js";
import { emitExpression } from "../../expression-emitter.js";
import { renderStatement } from "../../core/template.js";
import { emitBlock, emitStatementEntries, joinStatements } from "../blocks.js";

/**
 * Base class references are type names: no variable sigil
 */
const emitBase = (
  base: AstExpression,
  context: EmitterContext
): [string, EmitterContext] => {
  if (base.kind === "name") {
    return [base.id, context];
  }
  const [fragment, newContext] = emitExpression(base, context);
  return [fragment.text, newContext];
};

type Inheritance = {
  readonly header: string;
  readonly bodyLines: readonly string[];
};

const emitInheritance = (
  stmt: AstClassDef,
  context: EmitterContext
): [Inheritance, EmitterContext] => {
  const rule = context.profile.classes.inheritance;
  const bases = rule?.bases === "first" ? stmt.bases.slice(0, 1) : stmt.bases;
  if (rule === null || bases.length === 0) {
    return [{ header: "", bodyLines: [] }, context];
  }

  let currentContext = context;
  const names: string[] = [];
  for (const base of bases) {
    const [name, newContext] = emitBase(base, currentContext);
    names.push(name);
    currentContext = newContext;
  }

  const text = renderStatement(rule.template, {
    bases: names.join(", "),
    name: stmt.name,
  });
  return [
    rule.position === "header"
      ? { header: text, bodyLines: [] }
      : { header: "", bodyLines: [text] },
    currentContext,
  ];
};

/**
 * Emit a class declaration.
 *
 * Block-bodied classes nest their members; flat classes (struct-like
 * targets, metatable tables, packages) put the members after the header at
 * the same depth. Either way members see the class name in context, which
 * turns methods into the target's method form and assignments into fields.
 */
export const emitClassDeclaration = (
  stmt: AstClassDef,
  context: EmitterContext
): [string, EmitterContext] => {
  const { classes, keywords } = context.profile;
  const [inheritance, baseContext] = emitInheritance(stmt, context);

  const header =
    renderStatement(classes.header, {
      keyword: keywords.classDecl,
      name: stmt.name,
    }) + inheritance.header;
  const prologue = [
    ...(classes.bodyPrologue === null
      ? []
      : [renderStatement(classes.bodyPrologue, { name: stmt.name })]),
    ...inheritance.bodyLines,
  ];
  const scope = { scopes: [new Set<string>()], className: stmt.name };

  if (classes.body === "block") {
    return emitBlock(
      {
        header,
        body: stmt.body,
        scope,
        prologue,
        separateDefinitions: true,
      },
      baseContext,
      classes.trailer
    );
  }

  const ind = getIndent(baseContext);
  const headerLines = [header, ...prologue]
    .flatMap((line) => line.split("\n"))
    .map((line) => `${ind}${line}`)
    .join("\n");

  const [members, finalContext] = withScoped(baseContext, scope, (scoped) => {
    const [entries, memberContext] = emitStatementEntries(stmt.body, scoped);
    return [joinStatements(entries, true), memberContext];
  });

  return [
    members === "" ? headerLines : `${headerLines}\n\n${members}`,
    finalContext,
  ];
};
