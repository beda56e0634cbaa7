import type { Cursor } from "./cursor.js";
import { captureExpression, expressionAt, findTerminator } from "./expression.js";
import { ParseError } from "./errors.js";
import { parseNodes, tokenTerminator, type Terminator } from "./nodes.js";
import { parseLineBreak, parseToken, parseWhitespace, skipInlineSpace, startsWithKeyword } from "./primitives.js";
import type {
  CaseExpression,
  Expression,
  ForExpressionNode,
  IfExpressionNode,
  Node,
  Position,
  SwitchExpressionNode,
} from "./types.js";

/** Rest of a header line when that is blank. */
function parseOpenLine(cursor: Cursor) {
  const start = cursor.savepoint();
  skipInlineSpace(cursor);
  if (!parseLineBreak(cursor)) cursor.restore(start);
}

function parseOpenBrace(cursor: Cursor) {
  parseToken(cursor, "{");
  parseOpenLine(cursor);
}

/** `keyword <expression> {` */
function parseHeader(cursor: Cursor, keyword: string): { expression: Expression; from: Position } | undefined {
  if (!startsWithKeyword(cursor, keyword)) return undefined;
  const from = cursor.position();
  cursor.advance(keyword.length);
  const expression = captureExpression(cursor, "{", keyword);
  parseOpenBrace(cursor);
  return { expression, from };
}

/** Nodes up to `}`; the brace is consumed. */
function parseBlockBody(cursor: Cursor, name: string, from: Position): Node[] {
  const children = parseNodes(cursor, tokenTerminator("}", `${name}: closing brace`), from);
  parseToken(cursor, "}");
  return children;
}

export function parseIfExpression(cursor: Cursor): IfExpressionNode | undefined {
  const header = parseHeader(cursor, "if");
  if (!header) return undefined;
  const then = parseBlockBody(cursor, "if", header.from);
  return { type: "if", expression: header.expression, then, else: parseElse(cursor) };
}

/** `} else {` / `} else if` on the same line as the closing brace. */
function parseElse(cursor: Cursor): Node[] {
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
  if (startsWithKeyword(cursor, "if")) {
    const nested = parseIfExpression(cursor);
    if (nested) return [nested];
  }
  if (cursor.charAt() !== "{") {
    throw new ParseError("else: expected '{' or 'if'", from, cursor.position());
  }
  parseOpenBrace(cursor);
  return parseBlockBody(cursor, "else", from);
}

export function parseForExpression(cursor: Cursor): ForExpressionNode | undefined {
  const header = parseHeader(cursor, "for");
  if (!header) return undefined;
  const children = parseBlockBody(cursor, "for", header.from);
  return { type: "for", expression: header.expression, children };
}

function isDefaultClause(cursor: Cursor) {
  if (!cursor.startsWith("default")) return false;
  return /^[ \t]*:/.test(cursor.text.slice(cursor.index + 7, cursor.index + 64));
}

function isClauseStart(cursor: Cursor) {
  return startsWithKeyword(cursor, "case") || isDefaultClause(cursor);
}

const caseTerminator: Terminator = {
  name: "switch: case, default or closing brace",
  matches: (cursor) => cursor.startsWith("}") || isClauseStart(cursor),
};

/** `case <expr>:` or `default:`, captured including the colon. */
function parseCaseClause(cursor: Cursor): Expression {
  const start = cursor.index;
  const end = findTerminator(cursor.text, start + 4, ":");
  if (end < 0) {
    throw new ParseError("case: unterminated (missing closing ':')", cursor.position(), cursor.source.positionAt(cursor.text.length));
  }
  const expression = expressionAt(cursor, start, end + 1);
  cursor.restore(end + 1);
  return expression;
}

export function parseSwitchExpression(cursor: Cursor): SwitchExpressionNode | undefined {
  const header = parseHeader(cursor, "switch");
  if (!header) return undefined;
  const cases: CaseExpression[] = [];
  while (true) {
    parseWhitespace(cursor);
    if (parseToken(cursor, "}")) break;
    if (!isClauseStart(cursor)) {
      const message = cursor.eof()
        ? "switch: closing brace not found"
        : "switch: expected case, default or closing brace";
      throw new ParseError(message, header.from, cursor.position());
    }
    const from = cursor.position();
    const expression = parseCaseClause(cursor);
    parseOpenLine(cursor);
    const children = parseNodes(cursor, caseTerminator, from);
    cases.push({ expression, children });
  }
  return { type: "switch", expression: header.expression, cases };
}
