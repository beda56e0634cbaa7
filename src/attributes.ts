import type { Cursor } from "./cursor.js";
import { ParseError } from "./errors.js";
import { captureExpression, expressionAt, findTerminator } from "./expression.js";
import {
  parseAttributeName,
  parseStringLiteral,
  parseToken,
  parseWhitespace,
  skipInlineSpace,
  startsWithKeyword,
} from "./primitives.js";
import type { Attribute, ConditionalAttribute, Expression, Position, SpreadAttributes } from "./types.js";

function parseBracedExpression(cursor: Cursor, name: string): Expression {
  parseToken(cursor, "{");
  const expression = captureExpression(cursor, "}", name);
  parseToken(cursor, "}");
  return expression;
}

/** `{ attrs... }`; a brace group without the trailing `...` is not a spread. */
export function parseSpreadAttributes(cursor: Cursor): SpreadAttributes | undefined {
  if (cursor.charAt() !== "{") return undefined;
  const end = findTerminator(cursor.text, cursor.index + 1, "}");
  if (end < 0) return undefined;
  const inner = cursor.text.slice(cursor.index + 1, end).trimEnd();
  if (!inner.endsWith("...")) return undefined;
  const start = cursor.index + 1;
  const expression = expressionAt(cursor, start, start + inner.length - 3);
  cursor.restore(end + 1);
  return { type: "spread", expression };
}

/**
 * `if cond { attrs } else { attrs }` inside an open tag. Once `if ` is seen
 * the rest must be well formed.
 */
export function parseConditionalAttribute(cursor: Cursor): ConditionalAttribute | undefined {
  if (!startsWithKeyword(cursor, "if")) return undefined;
  const from = cursor.position();
  cursor.advance(2);
  const expression = captureExpression(cursor, "{", "if");
  parseToken(cursor, "{");
  const then = parseAttributeBlock(cursor, "if", from);
  return { type: "conditional", expression, then, else: parseAttributeElse(cursor) };
}

/** Attributes up to `}`, separated by any whitespace; the brace is consumed. */
function parseAttributeBlock(cursor: Cursor, name: string, from: Position): Attribute[] {
  const attributes: Attribute[] = [];
  while (true) {
    parseWhitespace(cursor);
    if (parseToken(cursor, "}")) return attributes;
    const attribute = parseAttribute(cursor);
    if (!attribute) {
      const message = cursor.eof()
        ? `${name}: closing brace not found`
        : `${name}: expected attribute or closing brace`;
      throw new ParseError(message, from, cursor.position());
    }
    attributes.push(attribute);
  }
}

function parseAttributeElse(cursor: Cursor): Attribute[] {
  const start = cursor.savepoint();
  skipInlineSpace(cursor);
  const next = cursor.charAt(4);
  if (!cursor.startsWith("else") || !(next === " " || next === "\t" || next === "{")) {
    cursor.restore(start);
    return [];
  }
  const from = cursor.position();
  cursor.advance(4);
  skipInlineSpace(cursor);
  const nested = parseConditionalAttribute(cursor);
  if (nested) return [nested];
  if (!parseToken(cursor, "{")) {
    throw new ParseError("else: expected '{' or 'if'", from, cursor.position());
  }
  return parseAttributeBlock(cursor, "else", from);
}

export function parseAttribute(cursor: Cursor): Attribute | undefined {
  const spread = parseSpreadAttributes(cursor);
  if (spread) return spread;
  const conditional = parseConditionalAttribute(cursor);
  if (conditional) return conditional;

  const start = cursor.savepoint();
  const name = parseAttributeName(cursor);
  if (!name) return undefined;

  if (cursor.startsWith("?={")) {
    cursor.advance(2);
    return { type: "bool-expression", name, expression: parseBracedExpression(cursor, `${name}?={`) };
  }
  if (cursor.startsWith("={")) {
    cursor.advance(1);
    return { type: "expression", name, expression: parseBracedExpression(cursor, `${name}={`) };
  }
  if (cursor.startsWith("=\"")) {
    cursor.advance(1);
    const value = parseStringLiteral(cursor) ?? "";
    return { type: "constant", name, value };
  }
  if (cursor.startsWith("=")) {
    // unquoted values are not part of the grammar
    cursor.restore(start);
    return undefined;
  }
  return { type: "bool-constant", name };
}

/** Attributes in source order, each preceded by whitespace. */
export function parseAttributes(cursor: Cursor): Attribute[] {
  const attributes: Attribute[] = [];
  while (true) {
    const start = cursor.savepoint();
    if (!parseWhitespace(cursor).value) break;
    const attribute = parseAttribute(cursor);
    if (!attribute) {
      cursor.restore(start);
      break;
    }
    attributes.push(attribute);
  }
  return attributes;
}
