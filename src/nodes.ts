import { parseCallTemplateExpression, parseChildrenExpression, parseStringExpression, parseTemplElementExpression } from "./calls.js";
import { parseForExpression, parseIfExpression, parseSwitchExpression } from "./control.js";
import type { Cursor, Parser } from "./cursor.js";
import { debug } from "./debug.js";
import { parseDocType, parseElement, parseRawElement } from "./elements.js";
import { ParseError } from "./errors.js";
import { parseText, parseWhitespace } from "./primitives.js";
import type { Node, Position } from "./types.js";

/** Marks where a node sequence ends; never consumed by the node parser. */
export interface Terminator {
  name: string;
  /** May advance the cursor; the node parser rewinds afterwards. */
  matches(cursor: Cursor): boolean;
}

export function tokenTerminator(token: string, name: string): Terminator {
  return { name, matches: (cursor) => cursor.startsWith(token) };
}

// Priority order: earlier alternatives shadow later ones.
function alternatives(): Array<Parser<Node>> {
  return [
    parseDocType,
    parseRawElement,
    parseElement,
    parseIfExpression,
    parseForExpression,
    parseSwitchExpression,
    parseCallTemplateExpression,
    parseTemplElementExpression,
    parseChildrenExpression,
    parseStringExpression,
  ];
}

/**
 * Reads nodes until `until` matches at a node boundary, or, without a
 * terminator, until nothing more can be parsed. Running out of input before
 * `until` matches is an error positioned at `from`.
 */
export function parseNodes(cursor: Cursor, until?: Terminator, from: Position = cursor.position()): Node[] {
  const nodes: Node[] = [];
  const parsers = alternatives();
  while (true) {
    if (until) {
      const start = cursor.savepoint();
      const done = until.matches(cursor);
      cursor.restore(start);
      if (done) {
        debug.nodes("terminator", { name: until.name, index: start, count: nodes.length });
        return nodes;
      }
    }

    let node: Node | undefined;
    for (const parse of parsers) {
      node = parse(cursor);
      if (node) break;
    }
    if (node) {
      nodes.push(node);
      continue;
    }

    const whitespace = parseWhitespace(cursor);
    if (whitespace.value.length > 0) {
      nodes.push(whitespace);
      continue;
    }

    const text = parseText(cursor);
    if (text) {
      nodes.push(text);
      continue;
    }

    if (!until) return nodes;
    throw new ParseError(`${until.name} not found`, from, cursor.position());
  }
}
