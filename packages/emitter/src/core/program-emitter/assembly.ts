/**
 * Whole-program wrapping
 */

import { isDefinition, type AstStatement } from "@retarget/frontend";
import type { WrapperStrategy } from "../../profiles/types.js";
import { atIndent, getIndent, type EmitterContext } from "../../types.js";
import { renderStatement } from "../template.js";
import { emitStatement } from "../../statement-emitter.js";
import {
  emitStatementEntries,
  joinStatements,
  noOpStatement,
  type EmittedStatement,
} from "../../statements/blocks.js";

type Wrapper<K extends WrapperStrategy["kind"]> = Extract<
  WrapperStrategy,
  { readonly kind: K }
>;

type Partitioned = {
  readonly definitions: readonly EmittedStatement[];
  /** Bare statement lines, already indented */
  readonly statements: readonly string[];
};

/**
 * Emit definitions and bare statements at their own depths, in source
 * order so both share one declaration scope.
 */
const emitPartitioned = (
  body: readonly AstStatement[],
  context: EmitterContext,
  definitionLevel: number,
  statementLevel: number
): [Partitioned, EmitterContext] => {
  const definitions: EmittedStatement[] = [];
  const statements: string[] = [];
  let currentContext = context;

  for (const statement of body) {
    const definition = isDefinition(statement);
    const [code, newContext] = emitStatement(
      statement,
      atIndent(currentContext, definition ? definitionLevel : statementLevel)
    );
    if (code !== "") {
      if (definition) {
        definitions.push({ statement, code });
      } else {
        statements.push(code);
      }
    }
    currentContext = newContext;
  }

  return [
    { definitions, statements },
    atIndent(currentContext, context.indentLevel),
  ];
};

/**
 * A synthesized entry block at the context's depth. An empty entry block
 * stays empty where the target closes blocks explicitly.
 */
const entryBlock = (
  header: string,
  statements: readonly string[],
  context: EmitterContext
): string => {
  const { profile } = context;
  const ind = getIndent(context);
  const noOpLine = `${getIndent(atIndent(context, context.indentLevel + 1))}${noOpStatement(context)}`;
  const body =
    statements.length > 0 || profile.blockClose !== null
      ? statements
      : [noOpLine];
  return [
    `${ind}${header}${profile.blockOpen}`,
    ...body,
    ...(profile.blockClose === null ? [] : [`${ind}${profile.blockClose}`]),
  ].join("\n");
};

const emitUnwrapped = (
  body: readonly AstStatement[],
  context: EmitterContext
): [string, EmitterContext] => {
  const [entries, finalContext] = emitStatementEntries(body, context);
  return [joinStatements(entries, true), finalContext];
};

/**
 * Definitions become members of one class; bare statements become the body
 * of its entry method.
 */
const emitSingleClass = (
  wrapper: Wrapper<"singleClassWithMain">,
  body: readonly AstStatement[],
  context: EmitterContext
): [string, EmitterContext] => {
  const { profile } = context;
  const name = context.options.entryClassName ?? wrapper.defaultClassName;
  const [{ definitions, statements }, finalContext] = emitPartitioned(
    body,
    context,
    1,
    2
  );

  const members = [
    ...(definitions.length > 0 ? [joinStatements(definitions, true)] : []),
    entryBlock(wrapper.mainHeader, statements, atIndent(context, 1)),
  ];
  const lines = [
    `${renderStatement(wrapper.classHeader, { name })}${profile.blockOpen}`,
    members.join("\n\n"),
    ...(profile.blockClose === null ? [] : [profile.blockClose]),
  ];
  return [lines.join("\n"), finalContext];
};

/**
 * Definitions stay at top level; bare statements move into the entry
 * function, which comes last.
 */
const emitEntryFunction = (
  wrapper: Wrapper<"entryFunction">,
  body: readonly AstStatement[],
  context: EmitterContext
): [string, EmitterContext] => {
  const [{ definitions, statements }, finalContext] = emitPartitioned(
    body,
    context,
    0,
    1
  );

  const parts = [
    ...(wrapper.prologue === null ? [] : [wrapper.prologue]),
    ...definitions.map((definition) => definition.code),
    entryBlock(wrapper.mainHeader, statements, context),
  ];
  return [parts.join("\n\n"), finalContext];
};

/**
 * Fixed prologue and epilogue around the whole body
 */
const emitEnclosed = (
  wrapper: Wrapper<"packageMainFunc" | "scriptTag">,
  body: readonly AstStatement[],
  context: EmitterContext
): [string, EmitterContext] => {
  const level = wrapper.indentBody ? 1 : 0;
  const [entries, finalContext] = emitStatementEntries(
    body,
    atIndent(context, level)
  );
  const parts = [
    wrapper.prologue,
    joinStatements(entries, true),
    wrapper.epilogue,
  ].filter((part) => part !== "");
  return [parts.join("\n"), atIndent(finalContext, context.indentLevel)];
};

/**
 * Emit the top-level statements under the profile's wrapper strategy
 */
export const emitWrapped = (
  body: readonly AstStatement[],
  context: EmitterContext
): [string, EmitterContext] => {
  const { wrapper } = context.profile;
  switch (wrapper.kind) {
    case "none":
      return emitUnwrapped(body, context);
    case "singleClassWithMain":
      return emitSingleClass(wrapper, body, context);
    case "entryFunction":
      return emitEntryFunction(wrapper, body, context);
    case "packageMainFunc":
    case "scriptTag":
      return emitEnclosed(wrapper, body, context);
  }
};
