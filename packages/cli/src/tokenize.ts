/**
 * Command line tokenizer
 *
 * Splits a single command string such as `ali 'EDIT "my notes.md"'` into
 * engine tokens:
 * - whitespace separates tokens
 * - double quotes group and allow `\"` and `\\` escapes
 * - single quotes group literally
 * - a `?` trailing a word is its own token (`PANE?` is `PANE ?`), while
 *   selector tokens such as `.?` or `@?` stay whole
 *
 * @module cli/tokenize
 */

export class TokenizeError extends Error {
  constructor(
    message: string,
    readonly position: number
  ) {
    super(message);
    this.name = "TokenizeError";
  }
}

function isWhitespace(char: string): boolean {
  return char === " " || char === "\t" || char === "\n" || char === "\r";
}

interface QuotedString {
  value: string;
  /** Index after the closing quote */
  end: number;
}

/**
 * Reads a quoted string starting at `start` (the opening quote).
 *
 * @throws TokenizeError on a missing closing quote
 */
function readQuotedString(input: string, start: number): QuotedString {
  const quote = input.charAt(start);
  let value = "";
  let position = start + 1;

  while (position < input.length) {
    const char = input.charAt(position);
    if (char === quote) {
      return { value, end: position + 1 };
    }
    if (quote === '"' && char === "\\" && position + 1 < input.length) {
      const next = input.charAt(position + 1);
      if (next === '"' || next === "\\") {
        value += next;
        position += 2;
        continue;
      }
    }
    value += char;
    position++;
  }

  throw new TokenizeError(`Unterminated ${quote === '"' ? "double" : "single"} quote at ${start}`, start);
}

/**
 * Splits a word ending in `?` after a letter or digit.
 */
function splitQuestion(word: string): string[] {
  if (word.length > 1 && word.endsWith("?") && /[A-Za-z0-9]$/.test(word.slice(0, -1))) {
    return [word.slice(0, -1), "?"];
  }
  return [word];
}

/**
 * @throws TokenizeError on an unterminated quote
 *
 * @example
 * ```typescript
 * tokenize(`EDIT "my notes.md"`); // ["EDIT", "my notes.md"]
 * tokenize("GO PANE?");           // ["GO", "PANE", "?"]
 * ```
 */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let position = 0;

  while (position < line.length) {
    if (isWhitespace(line.charAt(position))) {
      position++;
      continue;
    }

    // Quotes and bare text may be glued into one word: --name="a b"
    let word = "";
    let quoted = false;
    while (position < line.length && !isWhitespace(line.charAt(position))) {
      const char = line.charAt(position);
      if (char === '"' || char === "'") {
        const result = readQuotedString(line, position);
        word += result.value;
        position = result.end;
        quoted = true;
      } else {
        word += char;
        position++;
      }
    }

    tokens.push(...(quoted ? [word] : splitQuestion(word)));
  }

  return tokens;
}
