/**
 * Root of the syntax tree
 */

import type { AstExpression } from "./expressions.js";
import type { AstStatement } from "./statements.js";

export type AstProgram = {
  readonly kind: "program";
  readonly body: readonly AstStatement[];
};

/**
 * Any node of the closed syntax model
 */
export type SyntaxNode = AstProgram | AstStatement | AstExpression;

/**
 * A loaded tree document. `source` is the original program text when the
 * parser shipped it alongside the tree.
 */
export type SyntaxDocument = {
  readonly program: AstProgram;
  readonly source?: string;
};
