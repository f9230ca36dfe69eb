/**
 * Block and simple statement emitters
 */

import {
  isDefinition,
  type AstBreak,
  type AstContinue,
  type AstExpressionStatement,
  type AstImport,
  type AstPass,
  type AstReturn,
  type AstStatement,
} from "@retarget/frontend";
import {
  getIndent,
  pushScope,
  recordImport,
  withScoped,
  type EmitterContext,
} from "../types.js";
import { emitExpression } from "../expression-emitter.js";
import { emitStatement } from "../statement-emitter.js";
import { renderStatement } from "../core/template.js";
import { emitUnsupportedStatement } from "../core/unsupported.js";

/**
 * One headed block: a function or class body, or one clause of an `if`
 */
export type BlockSpec = {
  /** Header text without the block opener; may span several lines */
  readonly header: string;
  readonly body: readonly AstStatement[];
  /**
   * Scope of the body. Defaults to a new block on the current scope stack
   * inside the current class.
   */
  readonly scope?: {
    readonly scopes: readonly ReadonlySet<string>[];
    readonly className: string | undefined;
  };
  /** Lines emitted at body depth before the statements */
  readonly prologue?: readonly string[];
  /** Set blank lines around function and class definitions (class bodies) */
  readonly separateDefinitions?: boolean;
};

/**
 * One emitted statement alongside its source node
 */
export type EmittedStatement = {
  readonly statement: AstStatement;
  readonly code: string;
};

/**
 * Emit statements in order. Statements that emit nothing (imports, a
 * dropped `pass`) are left out.
 */
export const emitStatementEntries = (
  statements: readonly AstStatement[],
  context: EmitterContext
): [readonly EmittedStatement[], EmitterContext] => {
  let currentContext = context;
  const entries: EmittedStatement[] = [];

  for (const statement of statements) {
    const [code, newContext] = emitStatement(statement, currentContext);
    if (code !== "") {
      entries.push({ statement, code });
    }
    currentContext = newContext;
  }

  return [entries, currentContext];
};

/**
 * Join emitted statements, one per line, or with a blank line between two
 * statements when either is a definition.
 */
export const joinStatements = (
  entries: readonly EmittedStatement[],
  separateDefinitions: boolean
): string =>
  entries
    .map((entry, index) => {
      const previous = entries[index - 1];
      if (previous === undefined) {
        return entry.code;
      }
      const blank =
        separateDefinitions &&
        (isDefinition(previous.statement) || isDefinition(entry.statement));
      return `${blank ? "\n" : ""}\n${entry.code}`;
    })
    .join("");

/**
 * The no-op statement of the target, `;` where it has none
 */
export const noOpStatement = (context: EmitterContext): string =>
  context.profile.keywords.noOp ?? ";";

/**
 * Emit a block body at the context's indentation. A body that emits nothing
 * gets exactly one no-op line.
 */
export const emitBody = (
  body: readonly AstStatement[],
  context: EmitterContext,
  prologue: readonly string[] = [],
  separateDefinitions = false
): [string, EmitterContext] => {
  const ind = getIndent(context);
  const [entries, bodyContext] = emitStatementEntries(body, context);
  const content =
    entries.length > 0
      ? joinStatements(entries, separateDefinitions)
      : `${ind}${noOpStatement(context)}`;
  return [
    [...prologue.map((line) => `${ind}${line}`), content].join("\n"),
    bodyContext,
  ];
};

/**
 * Header lines at the current indentation, the last carrying the opener
 */
export const openBlock = (context: EmitterContext, header: string): string =>
  header
    .split("\n")
    .map((line) => `${getIndent(context)}${line}`)
    .join("\n") + context.profile.blockOpen;

/**
 * Emit a chain of clauses closed by one line. Brace targets continue the
 * chain on the closing line (`} else {`); the others start each clause on
 * its own line.
 */
export const emitClauses = (
  clauses: readonly BlockSpec[],
  context: EmitterContext,
  trailer = ""
): [string, EmitterContext] => {
  const { profile } = context;
  const ind = getIndent(context);
  const parts: string[] = [];
  let currentContext = context;

  clauses.forEach((clause, index) => {
    const continues =
      index > 0 && profile.blockStyle === "brace" && profile.blockClose !== null;
    parts.push(
      continues
        ? `${ind}${profile.blockClose} ${clause.header}${profile.blockOpen}`
        : openBlock(currentContext, clause.header)
    );

    const scope = clause.scope ?? {
      scopes: pushScope(currentContext),
      className: currentContext.className,
    };
    const [body, bodyContext] = withScoped(
      currentContext,
      { ...scope, indentLevel: currentContext.indentLevel + 1 },
      (scopedContext) =>
        emitBody(
          clause.body,
          scopedContext,
          clause.prologue,
          clause.separateDefinitions
        )
    );
    parts.push(body);
    currentContext = bodyContext;
  });

  if (profile.blockClose !== null) {
    parts.push(`${ind}${profile.blockClose}${trailer}`);
  }

  return [parts.join("\n"), currentContext];
};

export const emitBlock = (
  spec: BlockSpec,
  context: EmitterContext,
  trailer = ""
): [string, EmitterContext] => emitClauses([spec], context, trailer);

/**
 * Emit a simple statement line with the target's terminator
 */
export const simpleStatement = (
  context: EmitterContext,
  text: string
): string => `${getIndent(context)}${text}${context.profile.terminator}`;

export const emitReturn = (
  stmt: AstReturn,
  context: EmitterContext
): [string, EmitterContext] => {
  const { statements } = context.profile;
  if (stmt.value === undefined) {
    return [simpleStatement(context, statements.returnVoid), context];
  }

  const [value, newContext] = emitExpression(stmt.value, context);
  return [
    simpleStatement(context, renderStatement(statements.return, { value })),
    newContext,
  ];
};

export const emitExpressionStatement = (
  stmt: AstExpressionStatement,
  context: EmitterContext
): [string, EmitterContext] => {
  const [expr, newContext] = emitExpression(stmt.expression, context);
  return [simpleStatement(context, expr.text), newContext];
};

export const emitPass = (
  _stmt: AstPass,
  context: EmitterContext
): [string, EmitterContext] => [
  `${getIndent(context)}${noOpStatement(context)}`,
  context,
];

export const emitBreak = (
  _stmt: AstBreak,
  context: EmitterContext
): [string, EmitterContext] => [
  simpleStatement(context, context.profile.keywords.break),
  context,
];

export const emitContinue = (
  stmt: AstContinue,
  context: EmitterContext
): [string, EmitterContext] => {
  const keyword = context.profile.keywords.continue;
  return keyword === null
    ? emitUnsupportedStatement(context, "'continue'", stmt.location)
    : [simpleStatement(context, keyword), context];
};

/**
 * Imports emit nothing; they are reported for import synthesis
 */
export const emitImport = (
  stmt: AstImport,
  context: EmitterContext
): [string, EmitterContext] => ["", recordImport(context, stmt)];
