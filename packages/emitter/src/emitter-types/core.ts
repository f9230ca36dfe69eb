/**
 * Core emitter types
 */

import type {
  AstImport,
  BuiltinName,
  Diagnostic,
} from "@retarget/frontend";
import type { LanguageProfile } from "../profiles/types.js";

/**
 * Options for program emission
 */
export type EmitterOptions = {
  /** Indentation width in spaces */
  readonly indent?: number;
  /** Name of the class synthesized by class-wrapped targets */
  readonly entryClassName?: string;
};

/**
 * Context threaded through emission as `[result, context]` tuples.
 *
 * Nothing here is shared between emission calls: each `emitProgram` builds a
 * fresh context and drops it on return.
 */
export type EmitterContext = {
  readonly indentLevel: number;
  readonly options: EmitterOptions;
  readonly profile: LanguageProfile;
  /**
   * Names declared so far, innermost block last. Function and class bodies
   * start a new stack; nested blocks push onto the current one.
   */
  readonly scopes: readonly ReadonlySet<string>[];
  /** Set while emitting the members of a class body */
  readonly className?: string;
  /** Classes defined anywhere in the program */
  readonly classNames: ReadonlySet<string>;
  /** Functions defined anywhere in the program; they shadow builtins */
  readonly functionNames: ReadonlySet<string>;
  readonly diagnostics: readonly Diagnostic[];
  readonly usedBuiltins: ReadonlySet<BuiltinName>;
  readonly imports: readonly AstImport[];
};

/**
 * Emitted expression text with the binding strength of its outermost
 * construct, measured on the source precedence scale.
 */
export type CodeFragment = {
  readonly text: string;
  readonly precedence: number;
};

/**
 * Result of emitting one program
 */
export type ProgramEmission = {
  readonly code: string;
  /** Canonical id of the resolved target */
  readonly target: string;
  /** Placeholder sites and structural checks, in emission order */
  readonly diagnostics: readonly Diagnostic[];
  /** Builtins rewritten through the profile, sorted */
  readonly usedBuiltins: readonly BuiltinName[];
  /** Import-like statements that were dropped, in source order */
  readonly imports: readonly AstImport[];
};
