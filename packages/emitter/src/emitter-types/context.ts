/**
 * Context creation and manipulation functions
 */

import type {
  AstImport,
  AstProgram,
  AstStatement,
  BuiltinName,
  Diagnostic,
} from "@retarget/frontend";
import type { LanguageProfile } from "../profiles/types.js";
import type { EmitterContext, EmitterOptions } from "./core.js";

type DefinedNames = {
  readonly classNames: ReadonlySet<string>;
  readonly functionNames: ReadonlySet<string>;
};

/**
 * Collect class names everywhere and function names outside class bodies.
 * Methods are reached through an attribute, so they never shadow a builtin.
 */
const collectDefinedNames = (program: AstProgram): DefinedNames => {
  const classNames = new Set<string>();
  const functionNames = new Set<string>();

  const visit = (
    statements: readonly AstStatement[],
    inClass: boolean
  ): void => {
    for (const stmt of statements) {
      switch (stmt.kind) {
        case "functionDef":
          if (!inClass) {
            functionNames.add(stmt.name);
          }
          visit(stmt.body, false);
          break;
        case "classDef":
          classNames.add(stmt.name);
          visit(stmt.body, true);
          break;
        case "if":
          visit(stmt.body, inClass);
          visit(stmt.orelse, inClass);
          break;
        case "for":
        case "while":
          visit(stmt.body, inClass);
          break;
        default:
          break;
      }
    }
  };

  visit(program.body, false);
  return { classNames, functionNames };
};

/**
 * Create a new emitter context for one program
 */
export const createContext = (
  profile: LanguageProfile,
  options: EmitterOptions,
  program: AstProgram
): EmitterContext => {
  const { classNames, functionNames } = collectDefinedNames(program);
  return {
    indentLevel: 0,
    options,
    profile,
    scopes: [new Set<string>()],
    classNames,
    functionNames,
    diagnostics: [],
    usedBuiltins: new Set<BuiltinName>(),
    imports: [],
  };
};

/**
 * Increase indentation level
 */
export const indent = (context: EmitterContext): EmitterContext => ({
  ...context,
  indentLevel: context.indentLevel + 1,
});

/**
 * Set the indentation level outright
 */
export const atIndent = (
  context: EmitterContext,
  indentLevel: number
): EmitterContext => ({ ...context, indentLevel });

/**
 * Scoped fields that should be restored after emission.
 * These fields define lexical scopes and should not leak to parent scopes.
 */
type ScopedFields = Pick<EmitterContext, "scopes" | "className" | "indentLevel">;

/**
 * Execute an emission function with scoped context fields.
 *
 * Scoped fields are restored after emission; everything else the child
 * context accumulated (diagnostics, used builtins, imports) bubbles up.
 *
 * @example
 * ```typescript
 * const [body, finalCtx] = withScoped(
 *   context,
 *   { scopes: [new Set(params)], className: undefined },
 *   (scopedCtx) => emitBody(stmt.body, scopedCtx)
 * );
 * ```
 */
export const withScoped = <T>(
  context: EmitterContext,
  scopedPatch: Partial<ScopedFields>,
  emit: (ctx: EmitterContext) => [T, EmitterContext]
): [T, EmitterContext] => {
  const saved: ScopedFields = {
    scopes: context.scopes,
    className: context.className,
    indentLevel: context.indentLevel,
  };

  const childContext: EmitterContext = { ...context, ...scopedPatch };

  const [result, innerContext] = emit(childContext);

  const restoredContext: EmitterContext = {
    ...innerContext,
    ...saved,
  };

  return [result, restoredContext];
};

/**
 * Open a block scope on top of the current stack
 */
export const pushScope = (
  context: EmitterContext,
  names: readonly string[] = []
): readonly ReadonlySet<string>[] => [...context.scopes, new Set(names)];

/**
 * Whether a variable was declared in any enclosing block of this body
 */
export const isDeclared = (context: EmitterContext, name: string): boolean =>
  context.scopes.some((scope) => scope.has(name));

/**
 * Record names as declared in the innermost scope
 */
export const declare = (
  context: EmitterContext,
  names: readonly string[]
): EmitterContext => {
  const innermost: ReadonlySet<string> =
    context.scopes[context.scopes.length - 1] ?? new Set<string>();
  const updated = new Set([...innermost, ...names]);
  return {
    ...context,
    scopes: [...context.scopes.slice(0, -1), updated],
  };
};

export const reportDiagnostic = (
  context: EmitterContext,
  diagnostic: Diagnostic
): EmitterContext => ({
  ...context,
  diagnostics: [...context.diagnostics, diagnostic],
});

export const markBuiltin = (
  context: EmitterContext,
  builtin: BuiltinName
): EmitterContext =>
  context.usedBuiltins.has(builtin)
    ? context
    : { ...context, usedBuiltins: new Set([...context.usedBuiltins, builtin]) };

export const recordImport = (
  context: EmitterContext,
  statement: AstImport
): EmitterContext => ({
  ...context,
  imports: [...context.imports, statement],
});
