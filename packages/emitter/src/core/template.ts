/**
 * Profile template rendering.
 *
 * Templates carry `{slot}` placeholders and are rendered in a single pass:
 * inserted text is never scanned again, so emitted code containing braces
 * cannot be mistaken for a slot.
 *
 * A slot receives either a fragment, which is parenthesized when its
 * surroundings in the template would bind tighter than it does, or raw text
 * (names, joined argument lists), which is inserted as-is.
 */

import type { CodeFragment } from "../types.js";
import { PRECEDENCE, wrapBelow } from "../expressions/parentheses.js";

export type SlotValue = CodeFragment | string;

export type TemplateSlots = Readonly<Record<string, SlotValue>>;

/**
 * In statement mode a keyword next to a slot delimits it (`return {value}`,
 * `while {test} do`); in expression mode it does not (`{body} if {test}`).
 */
export type TemplateMode = "expression" | "statement";

const SLOT_SOURCE = "\\{(\\w+)\\}";
const SINGLE_SLOT = /^\{\w+\}$/;

/** Text that turns the slot before it into a receiver or callee */
const POSTFIX_FOLLOWER = /^(?:\.[A-Za-z_{]|\[|\(|->[A-Za-z_{[]|::|:[A-Za-z_{]|\$[A-Za-z_{])/;

const OPENERS: Readonly<Record<string, string>> = {
  "(": ")",
  "[": "]",
  "{": "}",
};

const isLeftDelimited = (before: string, mode: TemplateMode): boolean => {
  const trimmed = before.trimEnd();
  if (
    trimmed === "" ||
    /[([{,]$/.test(trimmed) ||
    trimmed.endsWith("=>") ||
    trimmed.endsWith("<-")
  ) {
    return true;
  }
  if (trimmed.endsWith("=") && !/[=!<>]=$/.test(trimmed)) {
    return true;
  }
  if (before.endsWith(": ")) {
    return true;
  }
  return mode === "statement" && /\w$/.test(trimmed);
};

const isRightDelimited = (after: string, mode: TemplateMode): boolean => {
  const trimmed = after.trimStart();
  if (
    trimmed === "" ||
    /^[)\]},;]/.test(trimmed) ||
    trimmed.startsWith("=>") ||
    trimmed.startsWith("<-")
  ) {
    return true;
  }
  if (/^=(?!=)/.test(trimmed) || after.startsWith(": ")) {
    return true;
  }
  return mode === "statement" && /^(?:\w|\{\w+\})/.test(trimmed);
};

const isTernaryLeft = (before: string): boolean => /[?:]$/.test(before.trimEnd());

const isTernaryRight = (after: string): boolean =>
  /^\s+[?:]\s/.test(after);

/**
 * Minimum precedence a fragment needs to sit in a slot unparenthesized
 */
const slotMinimum = (
  before: string,
  after: string,
  mode: TemplateMode
): number => {
  if (POSTFIX_FOLLOWER.test(after)) {
    return PRECEDENCE.atom;
  }

  const left = isLeftDelimited(before, mode)
    ? PRECEDENCE.lowest
    : isTernaryLeft(before)
      ? PRECEDENCE.or
      : PRECEDENCE.unary;
  const right = isRightDelimited(after, mode)
    ? PRECEDENCE.lowest
    : isTernaryRight(after)
      ? PRECEDENCE.or
      : PRECEDENCE.unary;

  return Math.max(left, right);
};

const skipQuoted = (text: string, start: number): number => {
  const quote = text[start];
  let index = start + 1;
  while (index < text.length && text[index] !== quote) {
    index += text[index] === "\\" ? 2 : 1;
  }
  return index + 1;
};

/**
 * Index just past the bracket group opening at `start`, or undefined when
 * the group never closes
 */
const skipGroup = (text: string, start: number): number | undefined => {
  const stack: string[] = [];
  let index = start;
  while (index < text.length) {
    const char = text[index] ?? "";
    const closer = OPENERS[char];
    if (closer !== undefined) {
      stack.push(closer);
      index++;
    } else if (char === '"' || char === "'") {
      index = skipQuoted(text, index);
    } else if (char === stack[stack.length - 1]) {
      stack.pop();
      index++;
      if (stack.length === 0) {
        return index;
      }
    } else {
      index++;
    }
  }
  return undefined;
};

const readIdentifier = (text: string, start: number): number => {
  let index = start;
  while (index < text.length && /[\w$@!]/.test(text[index] ?? "")) {
    index++;
  }
  return index;
};

/**
 * True when text is a primary expression followed only by member access,
 * calls and indexing: `x`, `f(x)`, `x.size()`, `[x]`, `$this->x`.
 */
export const isAtomShaped = (text: string): boolean => {
  const source = text.trim();
  const first = source[0];
  if (first === undefined) {
    return false;
  }

  let index: number | undefined;
  if (OPENERS[first] !== undefined) {
    index = skipGroup(source, 0);
  } else if (first === '"' || first === "'") {
    index = skipQuoted(source, 0);
  } else if (/[\w$@]/.test(first)) {
    index = readIdentifier(source, 0);
  }

  while (index !== undefined && index < source.length) {
    const char = source[index] ?? "";
    if (OPENERS[char] !== undefined) {
      index = skipGroup(source, index);
      continue;
    }

    const connector =
      source.startsWith("->", index) || source.startsWith("::", index)
        ? 2
        : char === "." || char === ":"
          ? 1
          : 0;
    if (connector === 0) {
      return false;
    }

    const next = source[index + connector] ?? "";
    if (OPENERS[next] !== undefined) {
      index = skipGroup(source, index + connector);
    } else if (/[\w$@]/.test(next)) {
      index = readIdentifier(source, index + connector);
    } else {
      return false;
    }
  }

  return index !== undefined && index >= source.length;
};

const resultPrecedence = (template: string, slots: TemplateSlots): number => {
  const trimmed = template.trim();
  if (SINGLE_SLOT.test(trimmed)) {
    const value = slots[trimmed.slice(1, -1)];
    if (value !== undefined && typeof value !== "string") {
      return value.precedence;
    }
  }
  const skeleton = template.replace(new RegExp(SLOT_SOURCE, "g"), "x");
  return isAtomShaped(skeleton) ? PRECEDENCE.atom : PRECEDENCE.lowest;
};

/**
 * Render a profile template. Slots missing from `slots` stay as literal text.
 */
export const renderTemplate = (
  template: string,
  slots: TemplateSlots,
  mode: TemplateMode = "expression"
): CodeFragment => {
  const pattern = new RegExp(SLOT_SOURCE, "g");
  let output = "";
  let cursor = 0;

  for (
    let match = pattern.exec(template);
    match !== null;
    match = pattern.exec(template)
  ) {
    const [token, name] = match;
    output += template.slice(cursor, match.index);
    cursor = match.index + token.length;

    const value = name === undefined ? undefined : slots[name];
    if (value === undefined) {
      output += token;
    } else if (typeof value === "string") {
      output += value;
    } else {
      const minimum = slotMinimum(output, template.slice(cursor), mode);
      output += wrapBelow(value, minimum).text;
    }
  }

  output += template.slice(cursor);
  return { text: output, precedence: resultPrecedence(template, slots) };
};

/**
 * Render a statement-level template to plain text
 */
export const renderStatement = (
  template: string,
  slots: TemplateSlots
): string => renderTemplate(template, slots, "statement").text;
