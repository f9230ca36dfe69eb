/**
 * Language profile - the declarative description of one target language.
 *
 * Profiles are pure data. Every field is required; a construct a target
 * cannot express is spelled `null`, and the emitters substitute a
 * placeholder for it.
 *
 * Text fields are templates with `{slot}` placeholders, rendered in a single
 * pass by `renderTemplate` (inserted text is never re-scanned). Braces that
 * do not enclose a bare word, like `{}` or `{ x }`, are literal text.
 */

import type {
  BinaryOperator,
  BooleanOperator,
  BuiltinName,
  ComparisonOperator,
  UnaryOperator,
} from "@retarget/frontend";
import type { TargetId } from "./catalog.js";
import type { PRECEDENCE } from "../expressions/parentheses.js";

export type BlockStyle = "brace" | "indent" | "endKeyword";

/** Named level on the source precedence scale */
export type BindingLevel = keyof typeof PRECEDENCE;

/**
 * Infix token that binds at another level than the source operator it
 * spells, e.g. R's `%%` binding tighter than `*`
 */
export type InfixRule = {
  readonly token: string;
  readonly binds: BindingLevel;
};

/**
 * An operator is an infix token (`"&&"`, `"-eq"`), an `InfixRule`, or a
 * call-shaped rewrite such as `{ template: "Math.pow({left}, {right})" }`.
 */
export type OperatorRule =
  | string
  | InfixRule
  | { readonly template: string }
  | null;

/**
 * Unary rewrites use `{operand}`; infix tokens are prefixed to the operand,
 * and an empty token drops the operator.
 */
export type UnaryRule = string | { readonly template: string } | null;

/**
 * Rewrite rule for one builtin call.
 *
 * Slots: `{args}` (arguments joined by `separator`), `{0}` `{1}` `{2}`
 * (single arguments), `{holes}` (`hole` repeated once per argument).
 * `byArity` wins over `pattern`; a call matching neither is unsupported.
 */
export type BuiltinRule = {
  readonly pattern: string | null;
  readonly byArity: Readonly<Partial<Record<number, string>>>;
  readonly separator: string;
  readonly hole: string;
};

export type DictRule =
  | {
      readonly kind: "literal";
      /** Slot: `{entries}` */
      readonly template: string;
      /** Slots: `{key}`, `{value}` */
      readonly entry: string;
      readonly separator: string;
      /** Spelling of an empty dict when it differs from the template */
      readonly empty: string | null;
    }
  | {
      /**
       * No literal syntax: a constructor call wrapped in one insertion call
       * per entry. Insert slots: `{target}`, `{key}`, `{value}`.
       */
      readonly kind: "insertion";
      readonly factory: string;
      readonly insert: string;
    };

export type InheritanceRule = {
  /** `header` appends to the class header; `body` is a first body line */
  readonly position: "header" | "body";
  /** Slots: `{bases}`, `{name}` */
  readonly template: string;
  readonly bases: "first" | "all";
};

export type WrapperStrategy =
  | { readonly kind: "none" }
  | {
      /** Definitions become members, bare statements the entry method body */
      readonly kind: "singleClassWithMain";
      /** Slot: `{name}` */
      readonly classHeader: string;
      readonly mainHeader: string;
      readonly defaultClassName: string;
    }
  | {
      readonly kind: "packageMainFunc" | "scriptTag";
      readonly prologue: string;
      readonly epilogue: string;
      readonly indentBody: boolean;
    }
  | {
      /** Definitions stay at top level, bare statements move into main */
      readonly kind: "entryFunction";
      readonly prologue: string | null;
      readonly mainHeader: string;
    };

export type LanguageProfile = {
  readonly id: TargetId;
  readonly blockStyle: BlockStyle;
  /** Appended to a block header line: `" {"`, `":"` or `""` */
  readonly blockOpen: string;
  /** Line closing a block; null where indentation alone closes it */
  readonly blockClose: string | null;
  /** Appended to simple statements */
  readonly terminator: string;

  readonly keywords: {
    /** Slot `{keyword}` of function declarations */
    readonly function: string;
    /** Slot `{keyword}` of class headers */
    readonly classDecl: string;
    /** Spelling of a bare receiver reference */
    readonly selfReference: string;
    /** Statement for an empty body; null means a lone `;` */
    readonly noOp: string | null;
    readonly break: string;
    readonly continue: string | null;
  };

  readonly functions: {
    /** Slots: `{keyword}`, `{name}`, `{params}` */
    readonly declaration: string;
    /** Slots: `{keyword}`, `{name}`, `{params}`, `{class}` */
    readonly method: string;
    /** Replaces the initializer method. Slots: `{params}`, `{class}` */
    readonly initializer: string;
    /** Slot: `{name}` (already carrying the variable sigil) */
    readonly parameter: string;
    /** Receiver parameter of methods; null when implicit */
    readonly selfParameter: string | null;
    readonly initializerSelfParameter: string | null;
    /** First body line binding parameters. Slot: `{params}` */
    readonly parameterPrologue: string | null;
  };

  readonly classes: {
    /** Slots: `{keyword}`, `{name}` */
    readonly header: string;
    readonly inheritance: InheritanceRule | null;
    /** `flat` emits members after the header at the same depth */
    readonly body: "block" | "flat";
    /** First body line. Slot: `{name}` */
    readonly bodyPrologue: string | null;
    /** Appended to the closing line of a block-bodied class */
    readonly trailer: string;
    /** Class-level variables. Slots: `{name}`, `{value}`, `{class}` */
    readonly field: string | null;
  };

  readonly variables: {
    /** Prefix of every variable reference */
    readonly sigil: string;
    /** Slots: `{target}`, `{value}` */
    readonly assign: string;
    /** First assignment of a name; null where plain assignment declares */
    readonly declaration: {
      readonly keyword: string;
      /** Slots: `{keyword}`, `{target}`, `{value}` */
      readonly template: string;
    } | null;
  };

  readonly control: {
    /** Slot: `{test}` */
    readonly if: string;
    readonly elseIf: string;
    readonly else: string;
    readonly while: string;
    /** Slots: `{var}`, `{iterable}` */
    readonly forEach: string | null;
    /** Counting loop over `range(stop)` / `range(start, stop)`. Slots: `{var}`, `{start}`, `{stop}` */
    readonly forRange: string | null;
  };

  readonly statements: {
    /** Slot: `{value}` */
    readonly return: string;
    readonly returnVoid: string;
    /** Compound assignment. Slots: `{target}`, `{op}`, `{value}`; null expands to a plain assignment */
    readonly augAssign: string | null;
  };

  readonly literals: {
    readonly true: string;
    readonly false: string;
    readonly null: string;
    readonly strings: {
      readonly quote: string;
      readonly escape: string;
      /** Characters that start interpolation inside a quoted string */
      readonly interpolation: string;
    };
  };

  readonly operators: {
    readonly binary: Readonly<Record<BinaryOperator, OperatorRule>>;
    /** String concatenation; used when either side of `+` is a string literal */
    readonly concat: OperatorRule;
    readonly comparison: Readonly<Record<ComparisonOperator, OperatorRule>>;
    readonly unary: Readonly<Record<UnaryOperator, UnaryRule>>;
    readonly boolean: Readonly<Record<BooleanOperator, string>>;
  };

  readonly expressions: {
    /** Slots: `{test}`, `{body}`, `{orelse}` */
    readonly conditional: string | null;
    /** Slots: `{value}`, `{attr}` */
    readonly attribute: string;
    /** Attribute in callee position */
    readonly method: string;
    /** Slot: `{attr}` */
    readonly selfAttribute: string;
    readonly selfMethod: string;
    /** Slots: `{value}`, `{index}` */
    readonly subscript: string;
    /** Instantiation of a class defined in the program. Slots: `{class}`, `{args}` */
    readonly construct: string;
  };

  readonly collections: {
    /** Slot: `{items}` */
    readonly list: string;
    readonly tuple: {
      readonly template: string;
      /** One-element spelling; null uses `template` */
      readonly singleton: string | null;
    };
    readonly dict: DictRule;
  };

  readonly builtins: Readonly<Record<BuiltinName, BuiltinRule>>;

  readonly wrapper: WrapperStrategy;
};
