/**
 * Character scanning of emitted code outside string literals
 */

export type CodePosition = {
  readonly index: number;
  /** 1-based */
  readonly line: number;
  /** 1-based */
  readonly column: number;
};

const QUOTES = new Set(['"', "'"]);

/**
 * Visit every character that is not inside a `"` or `'` string literal.
 * String state resets at each line end, so a stray quote cannot hide the
 * rest of the file.
 */
export const scanOutsideStrings = (
  code: string,
  escape: string,
  visit: (char: string, position: CodePosition) => void
): void => {
  let quote: string | undefined;
  let line = 1;
  let column = 1;

  for (let index = 0; index < code.length; index++) {
    const char = code[index] ?? "";

    if (char === "\n") {
      quote = undefined;
      line++;
      column = 1;
      continue;
    }

    if (quote !== undefined) {
      if (char === escape) {
        index++;
        column += 2;
        continue;
      }
      if (char === quote) {
        quote = undefined;
      }
    } else if (QUOTES.has(char)) {
      quote = char;
    } else {
      visit(char, { index, line, column });
    }
    column++;
  }
};
