/**
 * Collection literal emitters (list, tuple, dict)
 */

import type {
  AstDictLiteral,
  AstListLiteral,
  AstTupleLiteral,
} from "@retarget/frontend";
import { emitExpression } from "../expression-emitter.js";
import { renderTemplate } from "../core/template.js";
import type { CodeFragment, EmitterContext } from "../types.js";
import { emitExpressionList } from "./calls.js";
import { atom } from "./parentheses.js";

const joinItems = (items: readonly CodeFragment[]): string =>
  items.map((item) => item.text).join(", ");

export const emitList = (
  expr: AstListLiteral,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const [items, itemsContext] = emitExpressionList(expr.items, context);
  return [
    renderTemplate(context.profile.collections.list, {
      items: joinItems(items),
    }),
    itemsContext,
  ];
};

export const emitTuple = (
  expr: AstTupleLiteral,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const { tuple } = context.profile.collections;
  const [items, itemsContext] = emitExpressionList(expr.items, context);
  const template =
    items.length === 1 && tuple.singleton !== null
      ? tuple.singleton
      : tuple.template;
  return [renderTemplate(template, { items: joinItems(items) }), itemsContext];
};

/**
 * Emit a dict. Targets without a literal syntax build it with one insertion
 * call per entry around a constructor call.
 */
export const emitDict = (
  expr: AstDictLiteral,
  context: EmitterContext
): [CodeFragment, EmitterContext] => {
  const rule = context.profile.collections.dict;

  type Entry = { readonly key: CodeFragment; readonly value: CodeFragment };
  const [entries, entriesContext] = expr.entries.reduce<
    [readonly Entry[], EmitterContext]
  >(
    ([acc, ctx], entry) => {
      const [key, keyContext] = emitExpression(entry.key, ctx);
      const [value, valueContext] = emitExpression(entry.value, keyContext);
      return [[...acc, { key, value }], valueContext];
    },
    [[], context]
  );

  if (rule.kind === "insertion") {
    const built = entries.reduce<CodeFragment>(
      (target, { key, value }) =>
        renderTemplate(rule.insert, { target, key, value }),
      renderTemplate(rule.factory, {})
    );
    return [built, entriesContext];
  }

  if (entries.length === 0 && rule.empty !== null) {
    return [atom(rule.empty), entriesContext];
  }

  const rendered = entries
    .map(({ key, value }) => renderTemplate(rule.entry, { key, value }).text)
    .join(rule.separator);
  return [renderTemplate(rule.template, { entries: rendered }), entriesContext];
};
