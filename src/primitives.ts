import type { Cursor } from "./cursor.js";
import { ParseError } from "./errors.js";
import type { TextNode, WhitespaceNode } from "./types.js";

export function isLetter(ch: string) { return /^[A-Za-z]$/.test(ch); }
export function isWhitespace(ch: string) { return ch === " " || ch === "\t" || ch === "\r" || ch === "\n"; }
export function isLineBreak(ch: string) { return ch === "\r" || ch === "\n"; }
function isElementNameChar(ch: string) { return /^[A-Za-z0-9_:.-]$/.test(ch); }
function isAttributeNameStart(ch: string) { return /^[A-Za-z_@:]$/.test(ch); }
function isAttributeNameChar(ch: string) { return /^[A-Za-z0-9_:.@-]$/.test(ch); }
export function isIdentifierStart(ch: string) { return /^[A-Za-z_]$/.test(ch); }

/** Always succeeds; the value may be empty. */
export function parseWhitespace(cursor: Cursor): WhitespaceNode {
  let value = "";
  while (!cursor.eof() && isWhitespace(cursor.charAt())) value += cursor.take(1);
  return { type: "whitespace", value };
}

/** `keyword` followed by a space or tab. */
export function startsWithKeyword(cursor: Cursor, keyword: string) {
  if (!cursor.startsWith(keyword)) return false;
  const next = cursor.charAt(keyword.length);
  return next === " " || next === "\t";
}

/** Spaces and tabs only, never crossing a line. */
export function skipInlineSpace(cursor: Cursor) {
  while (cursor.charAt() === " " || cursor.charAt() === "\t") cursor.advance(1);
}

/** Consumes one `\n` or `\r\n` if present. */
export function parseLineBreak(cursor: Cursor): boolean {
  if (cursor.startsWith("\r\n")) { cursor.advance(2); return true; }
  if (cursor.startsWith("\n")) { cursor.advance(1); return true; }
  return false;
}

export function parseText(cursor: Cursor): TextNode | undefined {
  let value = "";
  while (!cursor.eof()) {
    const ch = cursor.charAt();
    if (ch === "<" || ch === "{" || ch === "}" || isLineBreak(ch)) break;
    value += cursor.take(1);
  }
  if (!value) return undefined;
  return { type: "text", value };
}

export function parseToken(cursor: Cursor, token: string): string | undefined {
  if (!cursor.startsWith(token)) return undefined;
  cursor.advance(token.length);
  return token;
}

const ESCAPES: Record<string, string> = { "\"": "\"", "\\": "\\", n: "\n", t: "\t" };

/** Double-quoted literal; returns the decoded value. */
export function parseStringLiteral(cursor: Cursor): string | undefined {
  if (cursor.charAt() !== "\"") return undefined;
  const start = cursor.savepoint();
  const from = cursor.position();
  cursor.advance(1);
  let out = "";
  while (!cursor.eof()) {
    const ch = cursor.take(1);
    if (ch === "\"") return out;
    if (ch === "\\") {
      const esc = cursor.take(1);
      out += ESCAPES[esc] ?? "\\" + esc;
    } else {
      out += ch;
    }
  }
  cursor.restore(start);
  throw new ParseError("string literal: unterminated (missing closing '\"')", from);
}

export function parseElementName(cursor: Cursor): string | undefined {
  if (!isLetter(cursor.charAt())) return undefined;
  let out = cursor.take(1);
  while (!cursor.eof() && isElementNameChar(cursor.charAt())) out += cursor.take(1);
  return out;
}

export function parseAttributeName(cursor: Cursor): string | undefined {
  if (!isAttributeNameStart(cursor.charAt())) return undefined;
  let out = cursor.take(1);
  while (!cursor.eof() && isAttributeNameChar(cursor.charAt())) out += cursor.take(1);
  return out;
}
