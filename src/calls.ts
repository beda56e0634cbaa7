import type { Cursor } from "./cursor.js";
import { captureExpression } from "./expression.js";
import { isIdentifierStart, parseToken, parseWhitespace } from "./primitives.js";
import type {
  CallTemplateExpressionNode,
  ChildrenExpressionNode,
  StringExpressionNode,
  TemplElementExpressionNode,
} from "./types.js";

/** `{! Name(a, b) }` */
export function parseCallTemplateExpression(cursor: Cursor): CallTemplateExpressionNode | undefined {
  if (!parseToken(cursor, "{!")) return undefined;
  const expression = captureExpression(cursor, "}", "call template expression");
  parseToken(cursor, "}");
  return { type: "call-template", expression };
}

/** `<!Name(a, b) />` */
export function parseTemplElementExpression(cursor: Cursor): TemplElementExpressionNode | undefined {
  if (!cursor.startsWith("<!") || !isIdentifierStart(cursor.charAt(2))) return undefined;
  cursor.advance(2);
  const expression = captureExpression(cursor, "/>", "templ element expression");
  parseToken(cursor, "/>");
  return { type: "templ-element", expression };
}

/** `{ children... }` */
export function parseChildrenExpression(cursor: Cursor): ChildrenExpressionNode | undefined {
  const start = cursor.savepoint();
  if (!parseToken(cursor, "{")) return undefined;
  parseWhitespace(cursor);
  if (parseToken(cursor, "children...")) {
    parseWhitespace(cursor);
    if (parseToken(cursor, "}")) return { type: "children" };
  }
  cursor.restore(start);
  return undefined;
}

/** `{ value }` */
export function parseStringExpression(cursor: Cursor): StringExpressionNode | undefined {
  if (!parseToken(cursor, "{")) return undefined;
  const expression = captureExpression(cursor, "}", "string expression");
  parseToken(cursor, "}");
  return { type: "string-expression", expression };
}
