import { Cursor } from "./cursor.js";
import { debug } from "./debug.js";
import { ParseError } from "./errors.js";
import { parseNodes, tokenTerminator } from "./nodes.js";
import { parseToken, parseWhitespace } from "./primitives.js";
import type { Expression, HostCode, HTMLTemplate, TemplateFile } from "./types.js";

const TEMPLATE_PREFIX = "templ ";

// Optional padding, `{`, end of line.
const HEADER_END = /[ \t]*\{\r?\n/g;

/**
 * `templ Name(p Parameter) {` and `templ (r Receiver) Name() {`.
 *
 * Everything between the prefix and the first `{` that ends a line is the
 * signature, captured as written.
 */
export function parseTemplateExpression(cursor: Cursor): Expression | undefined {
  if (!cursor.startsWith(TEMPLATE_PREFIX)) return undefined;
  cursor.advance(TEMPLATE_PREFIX.length);
  const from = cursor.position();

  HEADER_END.lastIndex = cursor.index;
  const match = HEADER_END.exec(cursor.text);
  if (!match) {
    throw new ParseError("templ: unterminated (missing closing '{\n')", from, cursor.source.positionAt(cursor.text.length));
  }
  const expression: Expression = {
    value: cursor.text.slice(cursor.index, match.index),
    range: { from, to: cursor.source.positionAt(match.index) },
  };
  cursor.restore(match.index + match[0].length);
  return expression;
}

export function parseHTMLTemplate(cursor: Cursor): HTMLTemplate | undefined {
  const from = cursor.position();
  const expression = parseTemplateExpression(cursor);
  if (!expression) return undefined;

  const children = parseNodes(cursor, tokenTerminator("}", "closing brace"), from);
  parseToken(cursor, "}");
  debug.parse("template", { signature: expression.value, children: children.length, line: from.line });
  return { type: "template", expression, children };
}

/** A single template; only whitespace may follow it. */
export function parseTemplate(source: string): HTMLTemplate {
  const cursor = new Cursor(source);
  const template = parseHTMLTemplate(cursor);
  if (!template) {
    throw new ParseError(`templ: expected '${TEMPLATE_PREFIX.trim()}' keyword`, cursor.position());
  }
  parseWhitespace(cursor);
  if (!cursor.eof()) {
    throw new ParseError("templ: unexpected content after template", cursor.position());
  }
  return template;
}

const TEMPLATE_LINE = /^templ /gm;

/** Templates plus the host code around them, in source order. */
export function parseTemplateFile(source: string): TemplateFile {
  const cursor = new Cursor(source);
  const nodes: TemplateFile["nodes"] = [];
  while (!cursor.eof()) {
    const atLineStart = cursor.index === 0 || cursor.text[cursor.index - 1] === "\n";
    const template = atLineStart ? parseHTMLTemplate(cursor) : undefined;
    if (template) {
      nodes.push(template);
      continue;
    }
    nodes.push(parseHostCode(cursor));
  }
  debug.parse("file", { templates: nodes.filter((n) => n.type === "template").length, items: nodes.length });
  return { nodes };
}

function parseHostCode(cursor: Cursor): HostCode {
  const from = cursor.position();
  TEMPLATE_LINE.lastIndex = cursor.index + 1;
  const match = TEMPLATE_LINE.exec(cursor.text);
  const end = match ? match.index : cursor.text.length;
  const value = cursor.text.slice(cursor.index, end);
  cursor.restore(end);
  return { type: "host-code", value, range: cursor.rangeFrom(from) };
}
