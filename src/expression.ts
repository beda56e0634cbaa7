import type { Cursor } from "./cursor.js";
import { ParseError } from "./errors.js";
import type { Expression } from "./types.js";

const CLOSERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };

/**
 * Finds the offset of `terminator` at bracket depth zero, outside string
 * literals and comments, starting at `from`. Returns -1 if there is none.
 */
export function findTerminator(text: string, from: number, terminator: string): number {
  const stack: string[] = [];
  let quote: string | null = null;
  let i = from;
  while (i < text.length) {
    const ch = text[i] ?? "";
    if (quote) {
      // raw strings have no escapes
      if (ch === "\\" && quote !== "`") { i += 2; continue; }
      if (ch === quote) quote = null;
      i++;
      continue;
    }
    if (stack.length === 0 && text.startsWith(terminator, i)) return i;
    if (ch === "/" && text[i + 1] === "/") {
      const end = text.indexOf("\n", i);
      i = end < 0 ? text.length : end;
      continue;
    }
    if (ch === "/" && text[i + 1] === "*") {
      const end = text.indexOf("*/", i + 2);
      i = end < 0 ? text.length : end + 2;
      continue;
    }
    if (ch === "\"" || ch === "'" || ch === "`") {
      quote = ch;
    } else if (ch in CLOSERS) {
      stack.push(CLOSERS[ch] ?? "");
    } else if (stack.length > 0 && ch === stack[stack.length - 1]) {
      stack.pop();
    }
    i++;
  }
  return -1;
}

/** Leading/trailing whitespace trimmed; the range covers only the kept text. */
export function expressionAt(cursor: Cursor, start: number, end: number): Expression {
  const raw = cursor.text.slice(start, end);
  const lead = raw.length - raw.trimStart().length;
  const value = raw.trim();
  const from = cursor.source.positionAt(start + lead);
  const to = cursor.source.positionAt(start + lead + value.length);
  return { value, range: { from, to } };
}

/**
 * Captures host-language text up to (not including) `terminator`.
 * Throws when the terminator never appears; the cursor is then untouched.
 */
export function captureExpression(cursor: Cursor, terminator: string, name: string): Expression {
  const start = cursor.index;
  const end = findTerminator(cursor.text, start, terminator);
  if (end < 0) {
    throw new ParseError(
      `${name}: unterminated (missing closing '${terminator}')`,
      cursor.position(),
      cursor.source.positionAt(cursor.text.length),
    );
  }
  const expression = expressionAt(cursor, start, end);
  cursor.restore(end);
  return expression;
}
